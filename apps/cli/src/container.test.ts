import { describe, it, expect } from "vitest";
import { createLogger } from "@docenrich/logger";
import { MemoryVectorStore } from "@docenrich/vector-store";
import { answerDependencies, createContainer, pipelineDependencies } from "./container.js";
import { testConfig } from "./test-helpers.js";

const logger = createLogger({ level: "silent", pretty: false, fd: 2 });

describe("createContainer", () => {
  const config = testConfig({
    vectorStore: { type: "memory", collectionName: "docs" },
    pipeline: { deadlineMs: 120000, defaultLanguage: "en" },
    enrichment: { concurrency: 3 },
    embedding: { batchSize: 8 },
  });

  it("builds the configured vector store and embedding provider", () => {
    const container = createContainer(config, logger);

    expect(container.vectorStore).toBeInstanceOf(MemoryVectorStore);
    expect(container.embeddingProvider.name).toBe("http");
    expect(container.embeddingProvider.dimensions).toBe(1024);
  });

  it("derives pipeline settings from the config", () => {
    const deps = pipelineDependencies(createContainer(config, logger));

    expect(deps.settings).toEqual({
      collectionName: "docs",
      deadlineMs: 120000,
      defaultLanguage: "en",
      concurrency: 3,
      batchSize: 8,
    });
  });

  it("lets command-line overrides win", () => {
    const deps = pipelineDependencies(createContainer(config, logger), {
      collectionName: "other",
      deadlineMs: 5000,
    });

    expect(deps.settings.collectionName).toBe("other");
    expect(deps.settings.deadlineMs).toBe(5000);
  });

  it("answers from the configured collection unless told otherwise", () => {
    const container = createContainer(config, logger);

    expect(answerDependencies(container).collectionName).toBe("docs");
    expect(answerDependencies(container, "other").collectionName).toBe("other");
    expect(answerDependencies(container).rag.topK).toBe(5);
  });
});
