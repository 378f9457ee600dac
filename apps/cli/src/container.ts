import type { AppConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { createStageClients, type StageClients } from "@docenrich/stages";
import { Enricher, PromptRegistry } from "@docenrich/enrichment";
import { RecursiveTextSplitter } from "@docenrich/chunker";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@docenrich/embeddings";
import { createVectorStore, type IVectorStore } from "@docenrich/vector-store";
import {
  FileRunLog,
  StoreWriter,
  type AnswerDependencies,
  type PipelineDependencies,
} from "@docenrich/core";

/** Everything a command needs, built once from the effective configuration. */
export interface Container {
  config: AppConfig;
  logger: Logger;
  stages: StageClients;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
}

export interface IngestOverrides {
  collectionName?: string;
  deadlineMs?: number;
}

export function createContainer(config: AppConfig, logger: Logger): Container {
  return {
    config,
    logger,
    stages: createStageClients(config, logger),
    embeddingProvider: createEmbeddingProvider(config.embedding, {
      serviceUrl: config.services.embedding,
      timeoutMs: config.timeouts.embedding,
      retry: config.retry,
      logger,
    }),
    vectorStore: createVectorStore(config.vectorStore),
  };
}

export function pipelineDependencies(
  container: Container,
  overrides: IngestOverrides = {},
): PipelineDependencies {
  const { config, logger, stages } = container;

  return {
    languageDetector: stages.languageDetector,
    structurer: stages.structurer,
    annotator: stages.annotator,
    splitter: new RecursiveTextSplitter(config.chunking.windowChars),
    enricher: new Enricher({
      generator: stages.generator,
      registry: new PromptRegistry(config.prompts),
      recoveryAttempts: config.enrichment.recoveryAttempts,
      temperature: config.generation.temperature,
      logger,
    }),
    embeddingProvider: container.embeddingProvider,
    storeWriter: new StoreWriter({ vectorStore: container.vectorStore, logger }),
    runLog: new FileRunLog(config.runLog.dir),
    logger,
    settings: {
      collectionName: overrides.collectionName ?? config.vectorStore.collectionName,
      deadlineMs: overrides.deadlineMs ?? config.pipeline.deadlineMs,
      defaultLanguage: config.pipeline.defaultLanguage,
      concurrency: config.enrichment.concurrency,
      batchSize: config.embedding.batchSize,
    },
  };
}

export function answerDependencies(
  container: Container,
  collectionName?: string,
): AnswerDependencies {
  const { config } = container;

  return {
    embeddingProvider: container.embeddingProvider,
    vectorStore: container.vectorStore,
    generator: container.stages.generator,
    collectionName: collectionName ?? config.vectorStore.collectionName,
    rag: config.rag,
    logger: container.logger,
  };
}
