import { z } from "zod";

// ---------- Language detection ----------

export const languageDetectionResponseSchema = z.object({
  language: z.string().nullable().optional(),
  status: z.string().optional(),
  error_message: z.string().nullable().optional(),
});

// ---------- Structuring ----------

export const layoutElementSchema = z.object({
  type: z.string(),
  text: z.string().nullable().optional(),
  metadata: z
    .object({
      page_number: z.number().int().nullable().optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
});

export const structuringResponseSchema = z.array(layoutElementSchema);

export type LayoutElement = z.infer<typeof layoutElementSchema>;

// ---------- Annotation ----------

export const annotationRequestSchema = z.object({
  text: z.string().min(1, "text must not be empty"),
  language: z.string().min(2),
  model: z.string().min(1),
});

export const annotationResponseSchema = z.object({
  entities: z.array(z.object({ text: z.string(), label: z.string() })).default([]),
  lemmas: z.array(z.unknown()).default([]),
  processed_language: z.string().optional(),
});

// ---------- Generation ----------

export const generationRequestSchema = z.object({
  model: z.string().min(1),
  prompt: z.string().min(1, "prompt must not be empty"),
  stream: z.literal(false),
  options: z.object({
    temperature: z.number().min(0).max(2),
    num_predict: z.number().int().positive(),
  }),
});

export const generationResponseSchema = z.object({
  response: z.string().optional(),
  error: z.string().optional(),
});
