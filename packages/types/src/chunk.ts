export const SENTIMENTS = ["positive", "neutral", "negative", "mixed"] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export interface NamedEntity {
  name: string;
  type: string;
}

export interface ChunkMetadata {
  mainTopic: string;
  sentiment: Sentiment;
  namedEntities: NamedEntity[];
}

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  order: number;
  language: string;
}

export interface EnrichmentBundle {
  summary: string;
  keywords: string[];
  questions: string[];
  keySentences: string[];
  metadata: ChunkMetadata;
}

/** A chunk whose bundle passed validation and may be forwarded to embedding. */
export interface ReconciledChunk extends Chunk {
  bundle: EnrichmentBundle;
  /** Ids of later chunks with identical normalized text that were merged into this one. */
  duplicateOf: string[];
}

export interface ChunkPayload extends Record<string, unknown> {
  documentId: string;
  chunkId: string;
  sourcePath: string;
  order: number;
  language: string;
  text: string;
  summary: string;
  keywords: string[];
  questions: string[];
  keySentences: string[];
  mainTopic: string;
  sentiment: Sentiment;
  namedEntities: NamedEntity[];
  annotatedEntities: { text: string; label: string }[];
  mergedChunkIds: string[];
}

export interface EmbeddingRecord {
  collectionName: string;
  chunkId: string;
  vector: number[];
  payload: ChunkPayload;
}
