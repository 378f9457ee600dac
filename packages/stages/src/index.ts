export { StageClient } from "./stage-client.js";
export type {
  StagePayload,
  StageCallOptions,
  StageResult,
  StageClientOptions,
} from "./stage-client.js";

export type {
  StructuredDocument,
  ILanguageDetector,
  IStructurer,
  IAnnotator,
  IGenerationClient,
  GenerateOptions,
} from "./stage-clients.interface.js";

export { LanguageDetectionClient } from "./language-detection-client.js";
export type { HttpStageOptions } from "./language-detection-client.js";
export { StructuringClient, buildStructuredText } from "./structuring-client.js";
export { AnnotationClient, selectModel } from "./annotation-client.js";
export type { AnnotationClientOptions } from "./annotation-client.js";
export { GenerationClient } from "./generation-client.js";
export type { GenerationClientOptions } from "./generation-client.js";
export { createStageClients } from "./factory.js";
export type { StageClients } from "./factory.js";
