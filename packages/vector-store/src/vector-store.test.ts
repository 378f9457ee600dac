import { describe, it, expect } from "vitest";
import { StageRejectedError } from "@docenrich/errors";
import {
  MemoryVectorStore,
  QdrantVectorStore,
  cosineSimilarity,
  createVectorStore,
  type VectorPoint,
} from "./index.js";

const ID_A = "00000000-0000-4000-8000-00000000000a";
const ID_B = "00000000-0000-4000-8000-00000000000b";
const ID_C = "00000000-0000-4000-8000-00000000000c";

function point(id: string, vector: number[], payload: Record<string, unknown> = {}): VectorPoint {
  return { id, vector, payload };
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates QdrantVectorStore for type 'qdrant'", () => {
      const store = createVectorStore({ type: "qdrant", qdrantUrl: "http://localhost:6333" });
      expect(store).toBeInstanceOf(QdrantVectorStore);
      expect(store.upsert).toBeTypeOf("function");
    });

    it("creates MemoryVectorStore for type 'memory'", () => {
      const store = createVectorStore({ type: "memory", qdrantUrl: "" });
      expect(store).toBeInstanceOf(MemoryVectorStore);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() => createVectorStore({ type: "qdrant", qdrantUrl: "" })).toThrow(
        "qdrantUrl is required",
      );
    });
  });

  describe("cosineSimilarity", () => {
    it("scores identical, orthogonal and diagonal vectors", () => {
      expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2);
    });

    it("returns 0 for a zero vector", () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });
  });

  describe("MemoryVectorStore", () => {
    it("replaces points with the same id", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 2);

      await store.upsert("docs", [point(ID_A, [1, 0], { text: "first" })]);
      await store.upsert("docs", [point(ID_A, [0, 1], { text: "second" })]);

      expect(store.count("docs")).toBe(1);
      expect(store.get("docs", ID_A)?.payload).toEqual({ text: "second" });
    });

    it("keeps an existing collection when ensured twice", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 2);
      await store.upsert("docs", [point(ID_A, [1, 0])]);
      await store.ensureCollection("docs", 2);

      expect(store.count("docs")).toBe(1);
    });

    it("rejects upserts into a missing collection", async () => {
      const store = new MemoryVectorStore();
      await expect(store.upsert("docs", [point(ID_A, [1, 0])])).rejects.toThrow(
        "storage rejected the request: collection docs does not exist",
      );
    });

    it("rejects vectors of the wrong dimension", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 3);
      await expect(store.upsert("docs", [point(ID_A, [1, 0])])).rejects.toBeInstanceOf(
        StageRejectedError,
      );
      expect(store.count("docs")).toBe(0);
    });

    it("ranks by cosine similarity and honours topK and threshold", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 2);
      await store.upsert("docs", [
        point(ID_A, [1, 0]),
        point(ID_B, [1, 1]),
        point(ID_C, [0, 1]),
      ]);

      const top2 = await store.search("docs", { vector: [1, 0], topK: 2 });
      expect(top2.map((r) => r.id)).toEqual([ID_A, ID_B]);

      const above = await store.search("docs", { vector: [1, 0], topK: 10, scoreThreshold: 0.5 });
      expect(above.map((r) => r.id)).toEqual([ID_A, ID_B]);
    });

    it("filters by document id and language", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 2);
      await store.upsert("docs", [
        point(ID_A, [1, 0], { documentId: "doc_1", language: "de" }),
        point(ID_B, [1, 0], { documentId: "doc_2", language: "de" }),
        point(ID_C, [1, 0], { documentId: "doc_2", language: "en" }),
      ]);

      const byDoc = await store.search("docs", {
        vector: [1, 0],
        topK: 10,
        filter: { documentId: "doc_2" },
      });
      expect(byDoc.map((r) => r.id).sort()).toEqual([ID_B, ID_C]);

      const byBoth = await store.search("docs", {
        vector: [1, 0],
        topK: 10,
        filter: { documentId: "doc_2", language: "en" },
      });
      expect(byBoth.map((r) => r.id)).toEqual([ID_C]);
    });

    it("drops every point with the collection", async () => {
      const store = new MemoryVectorStore();
      await store.ensureCollection("docs", 2);
      await store.upsert("docs", [point(ID_A, [1, 0])]);
      await store.deleteCollection("docs");

      expect(store.count("docs")).toBe(0);
      await expect(store.search("docs", { vector: [1, 0], topK: 1 })).rejects.toThrow(
        "does not exist",
      );
    });
  });
});
