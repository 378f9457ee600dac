export { TEXT_BLOCK_TYPES } from "./document.js";
export type {
  LayoutBlock,
  AnnotatedEntity,
  DocumentAnnotation,
  DocumentSource,
  Document,
} from "./document.js";

export { SENTIMENTS } from "./chunk.js";
export type {
  Sentiment,
  NamedEntity,
  ChunkMetadata,
  Chunk,
  EnrichmentBundle,
  ReconciledChunk,
  ChunkPayload,
  EmbeddingRecord,
} from "./chunk.js";

export { PIPELINE_STATES } from "./pipeline.js";
export type {
  PipelineState,
  StageName,
  StageStatus,
  RunError,
  ChunkOutcomeStatus,
  ChunkOutcome,
  PipelineRun,
  ExitCode,
  FailedChunk,
  RunSummary,
} from "./pipeline.js";

export type {
  NodeEnv,
  LogLevel,
  PromptId,
  AppConfig,
  ServiceUrls,
  StageTimeouts,
  RetryConfig,
  GenerationConfig,
  ChunkingConfig,
  EnrichmentConfig,
  AnnotationConfig,
  EmbeddingProviderType,
  EmbeddingConfig,
  VectorStoreType,
  VectorStoreSettings,
  PipelineConfig,
  RunLogConfig,
  RagConfig,
} from "./config.js";

export type { EmbeddingInputType, EmbeddingResult } from "./embedding.js";
