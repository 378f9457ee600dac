export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type PromptId = "semantic-chunking" | "summary-keywords" | "questions" | "key-sentences-metadata";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  services: ServiceUrls;
  timeouts: StageTimeouts;
  retry: RetryConfig;
  generation: GenerationConfig;
  chunking: ChunkingConfig;
  enrichment: EnrichmentConfig;
  annotation: AnnotationConfig;
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreSettings;
  pipeline: PipelineConfig;
  runLog: RunLogConfig;
  prompts: Partial<Record<PromptId, string>>;
  rag: RagConfig;
}

export interface ServiceUrls {
  languageDetection: string;
  structuring: string;
  annotation: string;
  embedding: string;
}

/** Per-call timeouts in milliseconds. */
export interface StageTimeouts {
  languageDetection: number;
  structuring: number;
  annotation: number;
  generation: number;
  embedding: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface GenerationConfig {
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface ChunkingConfig {
  windowChars: number;
}

export interface EnrichmentConfig {
  concurrency: number;
  recoveryAttempts: number;
}

export interface AnnotationConfig {
  /** Annotation model per language code; `default` is used for unlisted languages. */
  models: Record<string, string> & { default: string };
}

export type EmbeddingProviderType = "http" | "cohere";

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  batchSize: number;
  cohere: {
    apiKey: string;
    model: string;
  };
}

export type VectorStoreType = "qdrant" | "memory";

export interface VectorStoreSettings {
  type: VectorStoreType;
  collectionName: string;
  qdrantUrl: string;
  qdrantApiKey?: string;
}

export interface PipelineConfig {
  deadlineMs: number;
  defaultLanguage: string;
}

export interface RunLogConfig {
  dir: string;
}

export interface RagConfig {
  topK: number;
  scoreThreshold?: number;
  temperature: number;
  promptTemplate: string;
}
