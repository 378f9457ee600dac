import type { GenerationConfig, RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { StageRejectedError } from "@docenrich/errors";
import { StageClient } from "./stage-client.js";
import type { GenerateOptions, IGenerationClient } from "./stage-clients.interface.js";
import { generationRequestSchema, generationResponseSchema } from "./schemas.js";

export interface GenerationClientOptions extends GenerationConfig {
  timeoutMs: number;
  retry: RetryConfig;
  logger: Logger;
}

/**
 * Client for an Ollama-compatible text generation server (`POST /api/generate`,
 * non-streaming).
 */
export class GenerationClient implements IGenerationClient {
  private readonly client: StageClient;
  private readonly endpoint: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(options: GenerationClientOptions) {
    this.client = new StageClient({
      stage: "generation",
      retry: options.retry,
      logger: options.logger,
    });
    this.endpoint = `${options.baseUrl.replace(/\/$/, "")}/api/generate`;
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = options.timeoutMs;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    const body = {
      model: this.model,
      prompt,
      stream: false,
      options: {
        temperature: options?.temperature ?? this.temperature,
        num_predict: this.maxTokens,
      },
    };

    const { value } = await this.client.call(
      this.endpoint,
      { kind: "json", body },
      {
        timeoutMs: this.timeoutMs,
        requestSchema: generationRequestSchema,
        responseSchema: generationResponseSchema,
        signal: options?.signal,
      },
    );

    if (value.error !== undefined) {
      throw new StageRejectedError("generation", value.error);
    }
    if (value.response === undefined) {
      throw new StageRejectedError("generation", "response field missing");
    }
    return value.response;
  }
}
