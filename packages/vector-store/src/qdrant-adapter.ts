import { QdrantClient } from "@qdrant/js-client-rest";
import type {
  IVectorStore,
  VectorFilter,
  VectorPoint,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

const BATCH_SIZE = 100;

function toConditions(filter: VectorFilter | undefined) {
  const must: { key: string; match: { value: string } }[] = [];
  if (filter?.documentId) {
    must.push({ key: "documentId", match: { value: filter.documentId } });
  }
  if (filter?.language) {
    must.push({ key: "language", match: { value: filter.language } });
  }
  return must;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, points: VectorPoint[]): Promise<void> {
    for (let i = 0; i < points.length; i += BATCH_SIZE) {
      const batch = points.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((p) => ({ id: p.id, vector: p.vector, payload: p.payload })),
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const must = toConditions(params.filter);

    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      score_threshold: params.scoreThreshold,
      filter: must.length > 0 ? { must } : undefined,
      with_payload: true,
    });

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: r.payload ?? {},
    }));
  }

  async deleteCollection(collectionName: string): Promise<void> {
    const { exists } = await this.client.collectionExists(collectionName);
    if (!exists) return;
    await this.client.deleteCollection(collectionName);
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === collectionName);
    if (exists) return;

    await this.client.createCollection(collectionName, {
      vectors: {
        size: dimensions,
        distance: "Cosine",
      },
    });

    // Payload indexes for filtering
    await this.client.createPayloadIndex(collectionName, {
      field_name: "documentId",
      field_schema: "keyword",
      wait: true,
    });
    await this.client.createPayloadIndex(collectionName, {
      field_name: "language",
      field_schema: "keyword",
      wait: true,
    });
  }
}
