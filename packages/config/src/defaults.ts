/**
 * Built-in configuration. A JSON config file is deep-merged over this object and
 * environment variables are applied last; the result is validated by
 * `appConfigSchema`.
 */
export const DEFAULT_CONFIG = {
  nodeEnv: "production",
  logLevel: "info",

  services: {
    languageDetection: "http://127.0.0.1:8000/detect-language",
    structuring: "http://127.0.0.1:8001/structure-pdf/",
    annotation: "http://127.0.0.1:8002/process/",
    embedding: "http://127.0.0.1:8004",
  },

  timeouts: {
    languageDetection: 60_000,
    structuring: 300_000,
    annotation: 120_000,
    generation: 900_000,
    embedding: 600_000,
  },

  retry: {
    maxRetries: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
  },

  generation: {
    baseUrl: "http://localhost:11434",
    model: "deepseek-coder-v2:latest",
    temperature: 0.7,
    maxTokens: 4096,
  },

  chunking: {
    windowChars: 4_000,
  },

  enrichment: {
    concurrency: 4,
    recoveryAttempts: 2,
  },

  annotation: {
    models: {
      default: "de_core_news_sm",
      de: "de_core_news_sm",
      en: "en_core_web_sm",
    },
  },

  embedding: {
    provider: "http",
    dimensions: 1024,
    batchSize: 64,
    cohere: {
      apiKey: "",
      model: "embed-multilingual-v3.0",
    },
  },

  vectorStore: {
    type: "qdrant",
    collectionName: "rag_documents",
    qdrantUrl: "http://localhost:6333",
  },

  pipeline: {
    deadlineMs: 1_800_000,
    defaultLanguage: "de",
  },

  runLog: {
    dir: "./runs",
  },

  prompts: {},

  rag: {
    topK: 5,
    temperature: 0.1,
    promptTemplate: [
      "Answer the following question using only the context below.",
      "Be precise and quote the context directly where possible.",
      "If the answer is not clearly contained in the context, reply with:",
      "'This information is not contained in the provided document.'",
      "",
      "Context:",
      "{{context}}",
      "",
      "Question: {{question}}",
      "",
      "Answer:",
    ].join("\n"),
  },
};
