import { CohereClient, CohereError, CohereTimeoutError, type Cohere } from "cohere-ai";
import type { EmbeddingResult, RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import {
  StageRejectedError,
  StageTimeoutError,
  StageUnreachableError,
  abortReason,
  withRetry,
} from "@docenrich/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertVectors } from "./validate.js";

const DEFAULT_MODEL = "embed-multilingual-v3.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  retry?: RetryConfig;
  logger?: Logger;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;
  private timeoutMs: number;
  private retry?: RetryConfig;
  private logger?: Logger;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.retry = config.retry;
    this.logger = config.logger;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;
    const inputType = options?.inputType === "query" ? "search_query" : "search_document";

    // Process in batches of BATCH_SIZE
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(
        () => this.embedBatch(batch, inputType, options?.signal),
        {
          ...this.retry,
          signal: options?.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger?.warn({ attempt, delayMs, err: error }, "Cohere embed failed, retrying");
          },
        },
      );

      allEmbeddings.push(...(response.embeddings.float ?? []));

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    assertVectors(this.name, allEmbeddings, texts.length, this.dimensions);

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private async embedBatch(
    texts: string[],
    inputType: "search_document" | "search_query",
    signal?: AbortSignal,
  ): Promise<Cohere.EmbedByTypeResponse> {
    try {
      return await this.client.v2.embed(
        {
          texts,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        },
        { timeoutInSeconds: Math.ceil(this.timeoutMs / 1000), maxRetries: 0, abortSignal: signal },
      );
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      throw mapCohereError(err, this.timeoutMs);
    }
  }
}

function mapCohereError(err: unknown, timeoutMs: number): Error {
  if (err instanceof CohereTimeoutError) {
    return new StageTimeoutError("embedding", timeoutMs, { cause: err });
  }
  if (err instanceof CohereError) {
    const status = err.statusCode;
    if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
      return new StageRejectedError("embedding", err.message, { details: { status }, cause: err });
    }
    return new StageUnreachableError("embedding", err.message, 1, {
      details: { status },
      cause: err,
    });
  }
  return new StageUnreachableError("embedding", err instanceof Error ? err.message : String(err), 1, {
    cause: err,
  });
}
