import type { AnnotationConfig, DocumentAnnotation } from "@docenrich/types";
import { StageClient, type StageResult } from "./stage-client.js";
import type { HttpStageOptions } from "./language-detection-client.js";
import type { IAnnotator } from "./stage-clients.interface.js";
import { annotationRequestSchema, annotationResponseSchema } from "./schemas.js";

export interface AnnotationClientOptions extends HttpStageOptions {
  models: AnnotationConfig["models"];
}

/** Picks the annotation model for a language, falling back to the default model. */
export function selectModel(models: AnnotationConfig["models"], language: string): string {
  return models[language] ?? models.default;
}

export class AnnotationClient implements IAnnotator {
  private readonly client: StageClient;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly models: AnnotationConfig["models"];

  constructor(options: AnnotationClientOptions) {
    this.client = new StageClient({ ...options, stage: "annotation" });
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.models = options.models;
  }

  async annotate(
    text: string,
    language: string,
    signal?: AbortSignal,
  ): Promise<StageResult<DocumentAnnotation>> {
    const body = { text, language, model: selectModel(this.models, language) };

    const { value, attempts } = await this.client.call(
      this.url,
      { kind: "json", body },
      {
        timeoutMs: this.timeoutMs,
        requestSchema: annotationRequestSchema,
        responseSchema: annotationResponseSchema,
        signal,
      },
    );

    return {
      value: {
        language: value.processed_language ?? language,
        entities: value.entities,
        lemmaCount: value.lemmas.length,
      },
      attempts,
    };
  }
}
