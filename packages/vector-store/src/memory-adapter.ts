import { StageRejectedError } from "@docenrich/errors";
import type {
  IVectorStore,
  VectorPoint,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface MemoryCollection {
  dimensions: number;
  points: Map<string, VectorPoint>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** In-process store for tests and dry runs. */
export class MemoryVectorStore implements IVectorStore {
  private readonly collections = new Map<string, MemoryCollection>();

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    if (!this.collections.has(collectionName)) {
      this.collections.set(collectionName, { dimensions, points: new Map() });
    }
  }

  async upsert(collectionName: string, points: VectorPoint[]): Promise<void> {
    const collection = this.getCollection(collectionName);
    const wrong = points.find((p) => p.vector.length !== collection.dimensions);
    if (wrong) {
      throw new StageRejectedError(
        "storage",
        `point ${wrong.id} has dimension ${String(wrong.vector.length)}, collection expects ${String(collection.dimensions)}`,
      );
    }
    for (const point of points) {
      collection.points.set(point.id, { ...point, payload: { ...point.payload } });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.getCollection(collectionName);
    const { filter } = params;

    return [...collection.points.values()]
      .filter((p) => !filter?.documentId || p.payload["documentId"] === filter.documentId)
      .filter((p) => !filter?.language || p.payload["language"] === filter.language)
      .map((p) => ({ id: p.id, score: cosineSimilarity(params.vector, p.vector), payload: p.payload }))
      .filter((r) => params.scoreThreshold === undefined || r.score >= params.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, params.topK);
  }

  async deleteCollection(collectionName: string): Promise<void> {
    this.collections.delete(collectionName);
  }

  /** Points currently stored in a collection; 0 when it does not exist. */
  count(collectionName: string): number {
    return this.collections.get(collectionName)?.points.size ?? 0;
  }

  get(collectionName: string, id: string): VectorPoint | undefined {
    return this.collections.get(collectionName)?.points.get(id);
  }

  private getCollection(collectionName: string): MemoryCollection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new StageRejectedError("storage", `collection ${collectionName} does not exist`);
    }
    return collection;
  }
}
