import type { DocumentAnnotation, DocumentSource, LayoutBlock } from "@docenrich/types";
import type { StageResult } from "./stage-client.js";

export interface StructuredDocument {
  structuredText: string;
  blocks: LayoutBlock[];
}

export interface ILanguageDetector {
  /** Resolves to null when the service could not tell the language. */
  detect(source: DocumentSource, signal?: AbortSignal): Promise<StageResult<string | null>>;
}

export interface IStructurer {
  structure(source: DocumentSource, signal?: AbortSignal): Promise<StageResult<StructuredDocument>>;
}

export interface IAnnotator {
  annotate(
    text: string,
    language: string,
    signal?: AbortSignal,
  ): Promise<StageResult<DocumentAnnotation>>;
}

export interface GenerateOptions {
  temperature?: number;
  signal?: AbortSignal;
}

export interface IGenerationClient {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
