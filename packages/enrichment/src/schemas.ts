import { z } from "zod";
import { SENTIMENTS, type PromptId } from "@docenrich/types";

const text = z.string().refine((s) => s.trim().length > 0, { message: "must not be blank" });

function normalized(value: string): string {
  return value.normalize("NFC").replace(/\s+/gu, " ").trim();
}

/**
 * A list of non-blank strings with repeats dropped by `key`, keeping the first
 * spelling, that must hold `min` to `max` distinct entries.
 */
function distinctList(key: (value: string) => string, min: number, max: number) {
  return z
    .array(text)
    .transform((values) => {
      const seen = new Set<string>();
      return values.filter((value) => {
        const k = key(value);
        if (seen.has(k)) return false;
        seen.add(k);
        return true;
      });
    })
    .refine((values) => values.length >= min && values.length <= max, {
      message: `must hold ${String(min)} to ${String(max)} distinct entries`,
    });
}

/** Sentence-final punctuation followed by whitespace or the end of the text. */
const SENTENCE_END = /[.!?…]+(?=\s|$)/g;

export function countSentences(value: string): number {
  const ends = value.match(SENTENCE_END)?.length ?? 0;
  return Math.max(1, ends);
}

export const semanticChunkingSchema = z.array(text).min(1);

export const summaryKeywordsSchema = z.object({
  summary: text.refine((s) => countSentences(s) <= 3, {
    message: "summary must be at most 3 sentences",
  }),
  keywords: distinctList((k) => normalized(k).toLowerCase(), 3, 5),
});

export const questionsSchema = distinctList(normalized, 2, 3);

export const keySentencesMetadataSchema = z.object({
  key_sentences: z.array(text).min(1).max(3),
  metadata: z.object({
    main_topic: text,
    sentiment: z.enum(SENTIMENTS),
    named_entities: z.array(z.object({ name: text, type: text })),
  }),
});

export type SummaryKeywordsOutput = z.infer<typeof summaryKeywordsSchema>;
export type KeySentencesMetadataOutput = z.infer<typeof keySentencesMetadataSchema>;

export interface PromptOutputs {
  "semantic-chunking": string[];
  "summary-keywords": SummaryKeywordsOutput;
  questions: string[];
  "key-sentences-metadata": KeySentencesMetadataOutput;
}

export const OUTPUT_SCHEMAS: {
  [K in PromptId]: z.ZodType<PromptOutputs[K], z.ZodTypeDef, unknown>;
} = {
  "semantic-chunking": semanticChunkingSchema,
  "summary-keywords": summaryKeywordsSchema,
  questions: questionsSchema,
  "key-sentences-metadata": keySentencesMetadataSchema,
};
