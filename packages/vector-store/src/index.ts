import type { VectorStoreSettings } from "@docenrich/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { MemoryVectorStore } from "./memory-adapter.js";

export type {
  IVectorStore,
  VectorPoint,
  VectorSearchParams,
  VectorSearchResult,
  VectorFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { MemoryVectorStore, cosineSimilarity } from "./memory-adapter.js";

export type VectorStoreConfig = Pick<VectorStoreSettings, "type" | "qdrantUrl" | "qdrantApiKey">;

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "memory":
      return new MemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
