import type { VectorSearchResult } from "@docenrich/vector-store";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

/** A search hit with the payload fields retrieval needs. */
export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  text: string;
  score: number;
  payload: Record<string, unknown>;
}

function stringField(payload: Record<string, unknown>, key: string, fallback = ""): string {
  const value = payload[key];
  return typeof value === "string" ? value : fallback;
}

export function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  return {
    chunkId: stringField(result.payload, "chunkId", result.id),
    documentId: stringField(result.payload, "documentId"),
    text: stringField(result.payload, "text"),
    score: result.score,
    payload: result.payload,
  };
}

/** Chunk texts in rank order, separated by a horizontal rule. Empty texts are skipped. */
export function assembleContext(chunks: readonly ScoredChunk[]): string {
  return chunks
    .map((chunk) => chunk.text.trim())
    .filter((text) => text.length > 0)
    .join(CONTEXT_SEPARATOR);
}
