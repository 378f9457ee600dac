import { describe, it, expect } from "vitest";
import { envToConfigLayer, parseEnv } from "./env.js";

describe("parseEnv", () => {
  it("accepts an empty environment", () => {
    expect(parseEnv({})).toEqual({});
  });

  it("converts PIPELINE_DEADLINE_MS to a number", () => {
    expect(parseEnv({ PIPELINE_DEADLINE_MS: "60000" }).PIPELINE_DEADLINE_MS).toBe(60000);
  });

  it("rejects a non-numeric deadline", () => {
    expect(() => parseEnv({ PIPELINE_DEADLINE_MS: "soon" })).toThrow();
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv({ NODE_ENV: "staging" })).toThrow();
  });

  it("rejects an unknown vector store type", () => {
    expect(() => parseEnv({ VECTOR_STORE_TYPE: "chroma" })).toThrow();
  });
});

describe("envToConfigLayer", () => {
  it("maps variables onto config sections", () => {
    const layer = envToConfigLayer(
      parseEnv({
        LOG_LEVEL: "debug",
        QDRANT_URL: "http://qdrant:6333",
        QDRANT_API_KEY: "test-secret",
        COHERE_API_KEY: "test-cohere-key",
        OLLAMA_BASE_URL: "http://ollama:11434",
        GENERATION_MODEL: "llama3",
        PIPELINE_DEADLINE_MS: "1000",
      }),
    );

    expect(layer).toEqual({
      logLevel: "debug",
      vectorStore: { qdrantUrl: "http://qdrant:6333", qdrantApiKey: "test-secret" },
      embedding: { cohere: { apiKey: "test-cohere-key" } },
      generation: { baseUrl: "http://ollama:11434", model: "llama3" },
      pipeline: { deadlineMs: 1000 },
    });
  });

  it("ignores unrelated variables", () => {
    expect(envToConfigLayer(parseEnv({ HOME: "/home/test", PATH: "/usr/bin" }))).toEqual({});
  });
});
