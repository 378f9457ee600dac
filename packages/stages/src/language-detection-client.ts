import type { DocumentSource, RetryConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { StageRejectedError } from "@docenrich/errors";
import { StageClient, type StageResult } from "./stage-client.js";
import type { ILanguageDetector } from "./stage-clients.interface.js";
import { languageDetectionResponseSchema } from "./schemas.js";

export interface HttpStageOptions {
  url: string;
  timeoutMs: number;
  retry: RetryConfig;
  logger: Logger;
}

/**
 * Sends the PDF to the language detection service, which extracts the text
 * itself and answers with an ISO 639-1 code.
 */
export class LanguageDetectionClient implements ILanguageDetector {
  private readonly client: StageClient;
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: HttpStageOptions) {
    this.client = new StageClient({ ...options, stage: "languageDetection" });
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  async detect(source: DocumentSource, signal?: AbortSignal): Promise<StageResult<string | null>> {
    const { value, attempts } = await this.client.call(
      this.url,
      { kind: "file", fileName: source.fileName, bytes: source.bytes },
      { timeoutMs: this.timeoutMs, responseSchema: languageDetectionResponseSchema, signal },
    );

    if (value.status === "error") {
      throw new StageRejectedError(
        "languageDetection",
        value.error_message ?? "service reported an error",
      );
    }

    const language = value.language?.trim().toLowerCase();
    return { value: language ? language : null, attempts };
  }
}
