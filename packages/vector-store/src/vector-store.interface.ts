export interface VectorPoint {
  /** UUID-formatted point id; upserting the same id replaces the point. */
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  scoreThreshold?: number;
  filter?: VectorFilter;
}

export interface VectorFilter {
  documentId?: string;
  language?: string;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface IVectorStore {
  /** Creates the collection with cosine distance if it does not exist yet. */
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  upsert(collectionName: string, points: VectorPoint[]): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  deleteCollection(collectionName: string): Promise<void>;
}
