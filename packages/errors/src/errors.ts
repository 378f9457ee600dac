import type { StageName } from "@docenrich/types";
import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** A stage stayed unreachable (connection refused, 5xx) after every retry. */
export class StageUnreachableError extends AppError {
  public readonly stage: string;
  public readonly attempts: number;

  constructor(stage: string, message: string, attempts = 1, extras?: ErrorExtras) {
    super({
      message: `${stage} unreachable: ${message}`,
      statusCode: 503,
      code: "STAGE_UNREACHABLE",
      details: { ...extras?.details, stage, attempts },
      cause: extras?.cause,
    });
    this.stage = stage;
    this.attempts = attempts;
  }
}

/** The stage refused the request (4xx) or answered with a malformed body. */
export class StageRejectedError extends AppError {
  public readonly stage: string;

  constructor(stage: string, message: string, extras?: ErrorExtras) {
    super({
      message: `${stage} rejected the request: ${message}`,
      statusCode: 400,
      code: "STAGE_REJECTED",
      details: { ...extras?.details, stage },
      cause: extras?.cause,
    });
    this.stage = stage;
  }
}

export class StageTimeoutError extends AppError {
  public readonly stage: string;
  public readonly timeoutMs: number;

  constructor(stage: string, timeoutMs: number, extras?: ErrorExtras) {
    super({
      message: `${stage} did not answer within ${String(timeoutMs)}ms`,
      statusCode: 504,
      code: "STAGE_TIMEOUT",
      details: { ...extras?.details, stage, timeoutMs },
      cause: extras?.cause,
    });
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

/** No balanced JSON value could be recovered from generated text. */
export class RecoveryUnparseableError extends AppError {
  constructor(message = "No parseable JSON found in generated text", extras?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "RECOVERY_UNPARSEABLE",
      details: extras?.details,
      cause: extras?.cause,
    });
  }
}

export class RecoverySchemaMismatchError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[], extras?: ErrorExtras) {
    super({
      message: `Generated JSON does not match the expected schema: ${issues.join("; ")}`,
      statusCode: 422,
      code: "RECOVERY_SCHEMA_MISMATCH",
      details: { ...extras?.details, issues },
      cause: extras?.cause,
    });
    this.issues = issues;
  }
}

export interface MissingEnrichment {
  slot: string;
  code: string;
  reason: string;
}

/** One or more enrichment results for a chunk are missing or invalid. */
export class ReconcileIncompleteError extends AppError {
  public readonly chunkId: string;
  public readonly missing: MissingEnrichment[];

  constructor(chunkId: string, missing: MissingEnrichment[]) {
    super({
      message: `Chunk ${chunkId} is incomplete: ${missing
        .map((m) => `${m.slot} (${m.code}: ${m.reason})`)
        .join(", ")}`,
      statusCode: 422,
      code: "RECONCILE_INCOMPLETE",
      details: { chunkId, missing },
    });
    this.chunkId = chunkId;
    this.missing = missing;
  }
}

/** The per-document deadline expired. Never retried. */
export class DeadlineExceededError extends AppError {
  public readonly deadlineMs: number;

  constructor(deadlineMs: number, stage?: StageName) {
    super({
      message: stage
        ? `Document deadline of ${String(deadlineMs)}ms exceeded during ${stage}`
        : `Document deadline of ${String(deadlineMs)}ms exceeded`,
      statusCode: 504,
      code: "DEADLINE_EXCEEDED",
      details: { deadlineMs, stage },
    });
    this.deadlineMs = deadlineMs;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, extras?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIG_ERROR",
      details: extras?.details,
      cause: extras?.cause,
    });
  }
}
