import { z } from "zod";
import type { EmbeddingResult, RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { StageClient } from "@docenrich/stages";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertVectors } from "./validate.js";

const DEFAULT_DIMENSIONS = 1024;

export interface HttpProviderConfig {
  baseUrl: string;
  dimensions?: number;
  timeoutMs: number;
  retry: RetryConfig;
  logger: Logger;
}

const embedRequestSchema = z.object({
  texts: z.array(z.string().min(1)).min(1),
  dimensions: z.number().int().positive(),
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().optional(),
  model: z.string().optional(),
});

/**
 * Self-hosted embedding stage reached over HTTP (`POST /embed`).
 */
export class HttpEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "http";
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly client: StageClient;

  constructor(config: HttpProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs;
    this.client = new StageClient({ stage: "embedding", retry: config.retry, logger: config.logger });
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const { value } = await this.client.call(
      `${this.baseUrl}/embed`,
      { kind: "json", body: { texts, dimensions: this.dimensions } },
      {
        timeoutMs: this.timeoutMs,
        requestSchema: embedRequestSchema,
        responseSchema: embedResponseSchema,
        signal: options?.signal,
      },
    );

    assertVectors(this.name, value.embeddings, texts.length, this.dimensions);

    return {
      embeddings: value.embeddings,
      model: value.model ?? this.name,
      tokensUsed: value.tokens_used ?? 0,
      dimensions: this.dimensions,
    };
  }
}
