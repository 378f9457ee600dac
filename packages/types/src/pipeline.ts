export const PIPELINE_STATES = [
  "Ingested",
  "LanguageDetected",
  "Structured",
  "Annotated",
  "Chunked",
  "Enriching",
  "Embedded",
  "Stored",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number] | "Failed";

export type StageName =
  | "languageDetection"
  | "structuring"
  | "annotation"
  | "chunking"
  | "enrichment"
  | "embedding"
  | "storage";

export type StageStatus = "pending" | "succeeded" | "failed" | "retried";

export interface RunError {
  stage: StageName;
  code: string;
  message: string;
  chunkId?: string;
}

export type ChunkOutcomeStatus = "reconciled" | "partial-failed" | "stored";

export interface ChunkOutcome {
  chunkId: string;
  order: number;
  status: ChunkOutcomeStatus;
  reason?: string;
  code?: string;
}

/**
 * Per-invocation state of one document run. Only the orchestrator mutates it;
 * enrichment workers hand their results back instead of touching it.
 */
export interface PipelineRun {
  runId: string;
  documentId: string;
  sourcePath: string;
  state: PipelineState;
  failedStage?: StageName;
  failureReason?: string;
  stages: Record<StageName, StageStatus>;
  errors: RunError[];
  chunkOutcomes: Map<string, ChunkOutcome>;
  startedAt: Date;
}

export type ExitCode = 0 | 1 | 2;

export interface FailedChunk {
  chunkId: string;
  order: number;
  code: string;
  reason: string;
}

export interface RunSummary {
  runId: string;
  documentId: string;
  sourcePath: string;
  state: PipelineState;
  failedStage?: StageName;
  reason?: string;
  chunkCount: number;
  storedChunkIds: string[];
  failedChunks: FailedChunk[];
  mergedDuplicates: number;
  stages: Record<StageName, StageStatus>;
  durationMs: number;
  exitCode: ExitCode;
}
