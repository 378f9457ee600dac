import { z } from "zod";

const optionalInt = z
  .string()
  .regex(/^\d+$/, "must be a whole number")
  .transform(Number)
  .optional();

/**
 * Zod schema for the environment variables that override the config file.
 * Every variable is optional; unset variables leave the file or default
 * value in place.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  // ---------- Config file ----------
  DOCENRICH_CONFIG: z.string().min(1).optional(),

  // ---------- Qdrant ----------
  QDRANT_URL: z.string().min(1).optional(),
  QDRANT_API_KEY: z.string().min(1).optional(),
  VECTOR_STORE_TYPE: z.enum(["qdrant", "memory"]).optional(),

  // ---------- Cohere ----------
  COHERE_API_KEY: z.string().min(1).optional(),

  // ---------- Generation ----------
  OLLAMA_BASE_URL: z.string().min(1).optional(),
  GENERATION_MODEL: z.string().min(1).optional(),

  // ---------- Pipeline ----------
  PIPELINE_DEADLINE_MS: optionalInt,
});

export type EnvOverrides = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema. Throws a ZodError when a variable is set to an invalid value.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvOverrides {
  return envSchema.parse(env);
}

/**
 * Turn parsed environment overrides into a partial config object with the
 * same shape as the config file, so it can be deep-merged on top of it.
 */
export function envToConfigLayer(env: EnvOverrides): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  const section = (key: string): Record<string, unknown> => {
    const existing = layer[key];
    if (isPlainObject(existing)) return existing;
    const created: Record<string, unknown> = {};
    layer[key] = created;
    return created;
  };

  if (env.NODE_ENV !== undefined) layer["nodeEnv"] = env.NODE_ENV;
  if (env.LOG_LEVEL !== undefined) layer["logLevel"] = env.LOG_LEVEL;

  if (env.QDRANT_URL !== undefined) section("vectorStore")["qdrantUrl"] = env.QDRANT_URL;
  if (env.QDRANT_API_KEY !== undefined) section("vectorStore")["qdrantApiKey"] = env.QDRANT_API_KEY;
  if (env.VECTOR_STORE_TYPE !== undefined) section("vectorStore")["type"] = env.VECTOR_STORE_TYPE;

  if (env.COHERE_API_KEY !== undefined) {
    section("embedding")["cohere"] = { apiKey: env.COHERE_API_KEY };
  }

  if (env.OLLAMA_BASE_URL !== undefined) section("generation")["baseUrl"] = env.OLLAMA_BASE_URL;
  if (env.GENERATION_MODEL !== undefined) section("generation")["model"] = env.GENERATION_MODEL;

  if (env.PIPELINE_DEADLINE_MS !== undefined) {
    section("pipeline")["deadlineMs"] = env.PIPELINE_DEADLINE_MS;
  }

  return layer;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
