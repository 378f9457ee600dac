import type { ZodType, ZodTypeDef } from "zod";
import type { RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import {
  StageRejectedError,
  StageTimeoutError,
  StageUnreachableError,
  abortReason,
  withRetry,
} from "@docenrich/errors";

export type StagePayload =
  | { kind: "json"; body: unknown }
  | { kind: "file"; fileName: string; bytes: Uint8Array; contentType?: string };

export interface StageCallOptions<T> {
  timeoutMs: number;
  responseSchema: ZodType<T, ZodTypeDef, unknown>;
  /** Validated before anything is sent; only applies to JSON payloads. */
  requestSchema?: ZodType<unknown, ZodTypeDef, unknown>;
  /** Caller's cancellation, typically the document deadline. */
  signal?: AbortSignal;
}

export interface StageResult<T> {
  value: T;
  /** Number of HTTP attempts made, 1 when the first one succeeded. */
  attempts: number;
}

export interface StageClientOptions {
  /** Name used in errors and log lines, e.g. "annotation". */
  stage: string;
  retry: RetryConfig;
  logger: Logger;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const MAX_ERROR_BODY_CHARS = 300;

function describeFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici reports "fetch failed" and keeps the socket error as the cause
  if (err.cause instanceof Error) return `${err.message} (${err.cause.message})`;
  return err.message;
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .slice(0, 5)
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    return text.length > MAX_ERROR_BODY_CHARS ? `${text.slice(0, MAX_ERROR_BODY_CHARS)}…` : text;
  } catch {
    return "";
  }
}

/**
 * HTTP client for one enrichment stage.
 *
 * Connection failures, timeouts and 5xx answers are retried with exponential
 * backoff; 4xx answers and bodies that fail the response schema are surfaced at
 * once as {@link StageRejectedError}. When the caller's signal aborts, the abort
 * reason is thrown and no further attempt is started.
 */
export class StageClient {
  readonly stage: string;
  private readonly retry: RetryConfig;
  private readonly logger: Logger;
  private readonly onRetry?: StageClientOptions["onRetry"];

  constructor(options: StageClientOptions) {
    this.stage = options.stage;
    this.retry = options.retry;
    this.logger = options.logger.child({ stage: options.stage });
    this.onRetry = options.onRetry;
  }

  async call<T>(
    endpoint: string,
    payload: StagePayload,
    options: StageCallOptions<T>,
  ): Promise<StageResult<T>> {
    this.validatePayload(payload, options);

    let attempts = 0;
    const value = await withRetry(
      (attempt) => {
        attempts = attempt + 1;
        return this.attempt(endpoint, payload, options, attempts);
      },
      {
        maxRetries: this.retry.maxRetries,
        baseDelayMs: this.retry.baseDelayMs,
        maxDelayMs: this.retry.maxDelayMs,
        signal: options.signal,
        onRetry: ({ attempt, maxRetries, delayMs, error }) => {
          this.logger.warn(
            { endpoint, attempt, maxRetries, delayMs, err: error },
            "Stage call failed, retrying",
          );
          this.onRetry?.(attempt, error, delayMs);
        },
      },
    );

    return { value, attempts };
  }

  private validatePayload<T>(payload: StagePayload, options: StageCallOptions<T>): void {
    if (payload.kind === "file") {
      if (payload.bytes.byteLength === 0) {
        throw new StageRejectedError(this.stage, `file ${payload.fileName} is empty`);
      }
      return;
    }

    if (options.requestSchema) {
      const parsed = options.requestSchema.safeParse(payload.body);
      if (!parsed.success) {
        throw new StageRejectedError(
          this.stage,
          `invalid request payload: ${formatIssues(parsed.error.issues)}`,
        );
      }
    }
  }

  private buildInit(payload: StagePayload, signal: AbortSignal): RequestInit {
    if (payload.kind === "json") {
      return {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(payload.body),
        signal,
      };
    }

    const form = new FormData();
    form.append(
      "file",
      new Blob([payload.bytes], { type: payload.contentType ?? "application/pdf" }),
      payload.fileName,
    );
    return { method: "POST", headers: { Accept: "application/json" }, body: form, signal };
  }

  private async attempt<T>(
    endpoint: string,
    payload: StagePayload,
    options: StageCallOptions<T>,
    attempts: number,
  ): Promise<T> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const mapFailure = (err: unknown): Error => {
      if (options.signal?.aborted) return abortReason(options.signal);
      if (timeout.aborted) {
        return new StageTimeoutError(this.stage, options.timeoutMs, { cause: err });
      }
      return new StageUnreachableError(this.stage, describeFailure(err), attempts, {
        details: { endpoint },
        cause: err,
      });
    };

    let response: Response;
    try {
      response = await fetch(endpoint, this.buildInit(payload, signal));
    } catch (err) {
      throw mapFailure(err);
    }

    if (!response.ok) {
      const body = await readErrorBody(response);
      const message = `HTTP ${String(response.status)}${body ? `: ${body}` : ""}`;
      if (response.status >= 500 || response.status === 429) {
        throw new StageUnreachableError(this.stage, message, attempts, {
          details: { endpoint, status: response.status },
        });
      }
      throw new StageRejectedError(this.stage, message, {
        details: { endpoint, status: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (signal.aborted) throw mapFailure(err);
      throw new StageRejectedError(this.stage, "response body is not valid JSON", {
        details: { endpoint },
        cause: err,
      });
    }

    const parsed = options.responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new StageRejectedError(
        this.stage,
        `unexpected response shape: ${formatIssues(parsed.error.issues)}`,
        { details: { endpoint } },
      );
    }

    this.logger.debug({ endpoint, attempts }, "Stage call succeeded");
    return parsed.data;
  }
}
