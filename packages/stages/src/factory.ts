import type { AppConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { LanguageDetectionClient } from "./language-detection-client.js";
import { StructuringClient } from "./structuring-client.js";
import { AnnotationClient } from "./annotation-client.js";
import { GenerationClient } from "./generation-client.js";
import type {
  IAnnotator,
  IGenerationClient,
  ILanguageDetector,
  IStructurer,
} from "./stage-clients.interface.js";

export interface StageClients {
  languageDetector: ILanguageDetector;
  structurer: IStructurer;
  annotator: IAnnotator;
  generator: IGenerationClient;
}

export function createStageClients(config: AppConfig, logger: Logger): StageClients {
  const { services, timeouts, retry } = config;

  return {
    languageDetector: new LanguageDetectionClient({
      url: services.languageDetection,
      timeoutMs: timeouts.languageDetection,
      retry,
      logger,
    }),
    structurer: new StructuringClient({
      url: services.structuring,
      timeoutMs: timeouts.structuring,
      retry,
      logger,
    }),
    annotator: new AnnotationClient({
      url: services.annotation,
      timeoutMs: timeouts.annotation,
      models: config.annotation.models,
      retry,
      logger,
    }),
    generator: new GenerationClient({
      ...config.generation,
      timeoutMs: timeouts.generation,
      retry,
      logger,
    }),
  };
}
