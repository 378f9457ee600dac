import type { RagConfig } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import type { IEmbeddingProvider } from "@docenrich/embeddings";
import type { IVectorStore } from "@docenrich/vector-store";
import type { IGenerationClient } from "@docenrich/stages";
import { assembleContext, toScoredChunk, type ScoredChunk } from "./context-assembler.js";

export const NO_ANSWER =
  "I could not find any relevant information in the indexed documents to answer this question.";

export interface AnswerDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  generator: IGenerationClient;
  collectionName: string;
  rag: RagConfig;
  logger: Logger;
}

export interface AnswerResult {
  answer: string;
  sources: ScoredChunk[];
  context: string;
}

/** Fills `{{context}}` and `{{question}}` in one pass, so neither value is rescanned. */
export function renderAnswerPrompt(template: string, context: string, question: string): string {
  return template.replace(/\{\{(context|question)\}\}/g, (_match, key: string) =>
    key === "context" ? context : question,
  );
}

/**
 * Query → embed → vector search → assemble context → generate.
 * Without hits the generator is not called.
 */
export async function answer(question: string, deps: AnswerDependencies): Promise<AnswerResult> {
  const startTime = Date.now();
  const { rag } = deps;

  const embeddingResult = await deps.embeddingProvider.embed(question, { inputType: "query" });
  const queryVector = embeddingResult.embeddings[0];
  if (!queryVector) {
    throw new Error("Failed to generate embedding for question");
  }

  const results = await deps.vectorStore.search(deps.collectionName, {
    vector: queryVector,
    topK: rag.topK,
    scoreThreshold: rag.scoreThreshold,
  });
  const sources = results.map(toScoredChunk);
  const context = assembleContext(sources);

  if (context === "") {
    deps.logger.info({ hits: results.length }, "No relevant chunks found");
    return { answer: NO_ANSWER, sources: [], context };
  }

  const prompt = renderAnswerPrompt(rag.promptTemplate, context, question);
  const text = await deps.generator.generate(prompt, { temperature: rag.temperature });

  deps.logger.info(
    { hits: sources.length, retrievalTimeMs: Date.now() - startTime },
    "Question answered",
  );
  return { answer: text.trim(), sources, context };
}
