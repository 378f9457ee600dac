import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type {
  ChunkOutcomeStatus,
  FailedChunk,
  PipelineState,
  RunSummary,
  StageName,
  StageStatus,
} from "@docenrich/types";

export type RunLogEvent =
  | {
      type: "transition";
      runId: string;
      from: PipelineState | null;
      to: PipelineState;
      at: string;
      reason?: string;
    }
  | {
      type: "stage";
      runId: string;
      stage: StageName;
      status: StageStatus;
      attempts: number;
      at: string;
      code?: string;
      reason?: string;
    }
  | {
      type: "chunk";
      runId: string;
      chunkId: string;
      order: number;
      outcome: ChunkOutcomeStatus;
      at: string;
      code?: string;
      reason?: string;
    }
  | {
      type: "summary";
      runId: string;
      at: string;
      summary: RunSummary;
      partialFailedChunks: FailedChunk[];
    };

export interface IRunLog {
  append(documentId: string, event: RunLogEvent): Promise<void>;
}

/** Appends one JSON line per event to `<dir>/<documentId>.jsonl`. */
export class FileRunLog implements IRunLog {
  private readonly dir: string;
  private ready?: Promise<string | undefined>;

  constructor(dir: string) {
    this.dir = dir;
  }

  async append(documentId: string, event: RunLogEvent): Promise<void> {
    this.ready ??= mkdir(this.dir, { recursive: true });
    await this.ready;
    await appendFile(join(this.dir, `${documentId}.jsonl`), `${JSON.stringify(event)}\n`, "utf8");
  }
}

export class MemoryRunLog implements IRunLog {
  readonly events: { documentId: string; event: RunLogEvent }[] = [];

  async append(documentId: string, event: RunLogEvent): Promise<void> {
    this.events.push({ documentId, event });
  }

  ofType<K extends RunLogEvent["type"]>(type: K): Extract<RunLogEvent, { type: K }>[] {
    const matches: Extract<RunLogEvent, { type: K }>[] = [];
    for (const { event } of this.events) {
      if (isEventOfType(event, type)) matches.push(event);
    }
    return matches;
  }
}

function isEventOfType<K extends RunLogEvent["type"]>(
  event: RunLogEvent,
  type: K,
): event is Extract<RunLogEvent, { type: K }> {
  return event.type === type;
}
