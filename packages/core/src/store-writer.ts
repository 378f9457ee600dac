import type {
  AnnotatedEntity,
  ChunkPayload,
  EmbeddingRecord,
  ReconciledChunk,
} from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import type { IVectorStore } from "@docenrich/vector-store";

export interface StoreWriterOptions {
  vectorStore: IVectorStore;
  logger: Logger;
}

/** Annotation entities whose surface text occurs in the chunk, without repeats. */
export function entitiesInText(text: string, entities: readonly AnnotatedEntity[]): AnnotatedEntity[] {
  const seen = new Set<string>();
  const found: AnnotatedEntity[] = [];
  for (const entity of entities) {
    const key = `${entity.text}\0${entity.label}`;
    if (seen.has(key) || entity.text.trim() === "" || !text.includes(entity.text)) continue;
    seen.add(key);
    found.push({ text: entity.text, label: entity.label });
  }
  return found;
}

export function buildPayload(
  chunk: ReconciledChunk,
  sourcePath: string,
  entities: readonly AnnotatedEntity[],
): ChunkPayload {
  const { bundle } = chunk;
  return {
    documentId: chunk.documentId,
    chunkId: chunk.id,
    sourcePath,
    order: chunk.order,
    language: chunk.language,
    text: chunk.text,
    summary: bundle.summary,
    keywords: bundle.keywords,
    questions: bundle.questions,
    keySentences: bundle.keySentences,
    mainTopic: bundle.metadata.mainTopic,
    sentiment: bundle.metadata.sentiment,
    namedEntities: bundle.metadata.namedEntities,
    annotatedEntities: entitiesInText(chunk.text, entities),
    mergedChunkIds: chunk.duplicateOf,
  };
}

/**
 * Writes chunk records to the vector store. The chunk id is the point id, so
 * writing the same chunk twice replaces it.
 */
export class StoreWriter {
  private readonly vectorStore: IVectorStore;
  private readonly logger: Logger;

  constructor(options: StoreWriterOptions) {
    this.vectorStore = options.vectorStore;
    this.logger = options.logger.child({ stage: "storage" });
  }

  ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    return this.vectorStore.ensureCollection(collectionName, dimensions);
  }

  upsert(
    collectionName: string,
    chunkId: string,
    vector: number[],
    payload: ChunkPayload,
  ): Promise<void> {
    return this.upsertMany([{ collectionName, chunkId, vector, payload }]);
  }

  async upsertMany(records: readonly EmbeddingRecord[]): Promise<void> {
    const byCollection = new Map<string, EmbeddingRecord[]>();
    for (const record of records) {
      const group = byCollection.get(record.collectionName);
      if (group) group.push(record);
      else byCollection.set(record.collectionName, [record]);
    }

    for (const [collectionName, group] of byCollection) {
      await this.vectorStore.upsert(
        collectionName,
        group.map((r) => ({ id: r.chunkId, vector: r.vector, payload: r.payload })),
      );
      this.logger.debug({ collectionName, count: group.length }, "Upserted chunk records");
    }
  }
}
