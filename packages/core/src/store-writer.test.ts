import { describe, it, expect } from "vitest";
import type { ReconciledChunk } from "@docenrich/types";
import { createLogger } from "@docenrich/logger";
import { MemoryVectorStore } from "@docenrich/vector-store";
import { StoreWriter, buildPayload, entitiesInText } from "./store-writer.js";

const logger = createLogger({ level: "silent", pretty: false, fd: 2 });

const CHUNK: ReconciledChunk = {
  id: "00000000-0000-4000-8000-000000000001",
  documentId: "doc_0123456789abcdef",
  order: 4,
  text: "Acme opened a plant in Berlin.",
  language: "en",
  bundle: {
    summary: "Acme opened a plant.",
    keywords: ["Acme", "plant", "Berlin"],
    questions: ["Where did Acme open a plant?", "What did Acme open?"],
    keySentences: ["Acme opened a plant in Berlin."],
    metadata: {
      mainTopic: "Manufacturing",
      sentiment: "neutral",
      namedEntities: [{ name: "Acme", type: "ORGANIZATION" }],
    },
  },
  duplicateOf: ["00000000-0000-4000-8000-000000000009"],
};

const ENTITIES = [
  { text: "Berlin", label: "LOC" },
  { text: "Munich", label: "LOC" },
  { text: "Acme", label: "ORG" },
  { text: "Berlin", label: "LOC" },
];

describe("entitiesInText", () => {
  it("keeps entities that occur in the text, once each", () => {
    expect(entitiesInText(CHUNK.text, ENTITIES)).toEqual([
      { text: "Berlin", label: "LOC" },
      { text: "Acme", label: "ORG" },
    ]);
  });
});

describe("buildPayload", () => {
  it("flattens the chunk and its bundle", () => {
    expect(buildPayload(CHUNK, "/data/report.pdf", ENTITIES)).toEqual({
      documentId: "doc_0123456789abcdef",
      chunkId: "00000000-0000-4000-8000-000000000001",
      sourcePath: "/data/report.pdf",
      order: 4,
      language: "en",
      text: "Acme opened a plant in Berlin.",
      summary: "Acme opened a plant.",
      keywords: ["Acme", "plant", "Berlin"],
      questions: ["Where did Acme open a plant?", "What did Acme open?"],
      keySentences: ["Acme opened a plant in Berlin."],
      mainTopic: "Manufacturing",
      sentiment: "neutral",
      namedEntities: [{ name: "Acme", type: "ORGANIZATION" }],
      annotatedEntities: [
        { text: "Berlin", label: "LOC" },
        { text: "Acme", label: "ORG" },
      ],
      mergedChunkIds: ["00000000-0000-4000-8000-000000000009"],
    });
  });
});

describe("StoreWriter", () => {
  it("is idempotent by chunk id", async () => {
    const store = new MemoryVectorStore();
    const writer = new StoreWriter({ vectorStore: store, logger });
    const payload = buildPayload(CHUNK, "/data/report.pdf", []);

    await writer.ensureCollection("docs", 2);
    await writer.upsert("docs", CHUNK.id, [1, 0], payload);
    await writer.upsert("docs", CHUNK.id, [0, 1], payload);

    expect(store.count("docs")).toBe(1);
    expect(store.get("docs", CHUNK.id)?.vector).toEqual([0, 1]);
  });

  it("writes each record into its own collection", async () => {
    const store = new MemoryVectorStore();
    const writer = new StoreWriter({ vectorStore: store, logger });
    const payload = buildPayload(CHUNK, "/data/report.pdf", []);
    await writer.ensureCollection("a", 2);
    await writer.ensureCollection("b", 2);

    await writer.upsertMany([
      { collectionName: "a", chunkId: CHUNK.id, vector: [1, 0], payload },
      { collectionName: "b", chunkId: CHUNK.id, vector: [1, 0], payload },
      { collectionName: "b", chunkId: "00000000-0000-4000-8000-000000000002", vector: [0, 1], payload },
    ]);

    expect(store.count("a")).toBe(1);
    expect(store.count("b")).toBe(2);
  });
});
