import { z } from "zod";

const url = z.string().url();
const positiveInt = z.number().int().positive();
const promptText = z.string().min(1).optional();

/**
 * Zod schema for the merged configuration object. Parsing it yields a value
 * assignable to {@link AppConfig}.
 */
export const appConfigSchema = z.object({
  nodeEnv: z.enum(["development", "test", "production"]),
  logLevel: z.enum(["debug", "info", "warn", "error"]),

  services: z.object({
    languageDetection: url,
    structuring: url,
    annotation: url,
    embedding: url,
  }),

  timeouts: z.object({
    languageDetection: positiveInt,
    structuring: positiveInt,
    annotation: positiveInt,
    generation: positiveInt,
    embedding: positiveInt,
  }),

  retry: z.object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
  }),

  generation: z.object({
    baseUrl: url,
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: positiveInt,
  }),

  chunking: z.object({
    windowChars: z.number().int().min(200),
  }),

  enrichment: z.object({
    concurrency: z.number().int().min(1).max(64),
    recoveryAttempts: z.number().int().min(0).max(5),
  }),

  annotation: z.object({
    models: z.object({ default: z.string().min(1) }).catchall(z.string().min(1)),
  }),

  embedding: z.object({
    provider: z.enum(["http", "cohere"]),
    dimensions: positiveInt,
    batchSize: positiveInt,
    cohere: z.object({
      apiKey: z.string(),
      model: z.string().min(1),
    }),
  }),

  vectorStore: z.object({
    type: z.enum(["qdrant", "memory"]),
    collectionName: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9_-]+$/, "collectionName may only contain letters, digits, _ and -"),
    qdrantUrl: url,
    qdrantApiKey: z.string().min(1).optional(),
  }),

  pipeline: z.object({
    deadlineMs: positiveInt,
    defaultLanguage: z.string().min(2),
  }),

  runLog: z.object({
    dir: z.string().min(1),
  }),

  prompts: z
    .object({
      "semantic-chunking": promptText,
      "summary-keywords": promptText,
      questions: promptText,
      "key-sentences-metadata": promptText,
    })
    .strict(),

  rag: z.object({
    topK: z.number().int().min(1).max(50),
    scoreThreshold: z.number().min(-1).max(1).optional(),
    temperature: z.number().min(0).max(2),
    promptTemplate: z
      .string()
      .refine((t) => t.includes("{{context}}") && t.includes("{{question}}"), {
        message: "promptTemplate must contain {{context}} and {{question}}",
      }),
  }),
});

export type ParsedConfig = z.infer<typeof appConfigSchema>;
