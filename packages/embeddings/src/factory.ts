import type { EmbeddingConfig, RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { ConfigError } from "@docenrich/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { HttpEmbeddingProvider } from "./http-provider.js";

export interface EmbeddingFactoryOptions {
  /** Base URL of the HTTP embedding stage. */
  serviceUrl: string;
  timeoutMs: number;
  retry: RetryConfig;
  logger: Logger;
}

export function createEmbeddingProvider(
  config: EmbeddingConfig,
  options: EmbeddingFactoryOptions,
): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere.apiKey) {
        throw new ConfigError("Cohere API key is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohere.apiKey,
        model: config.cohere.model,
        dimensions: config.dimensions,
        timeoutMs: options.timeoutMs,
        retry: options.retry,
        logger: options.logger,
      });
    case "http":
      return new HttpEmbeddingProvider({
        baseUrl: options.serviceUrl,
        dimensions: config.dimensions,
        timeoutMs: options.timeoutMs,
        retry: options.retry,
        logger: options.logger,
      });
    default:
      throw new ConfigError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
