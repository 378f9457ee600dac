import { PassThrough } from "node:stream";
import { describe, it, expect, vi, type Mock } from "vitest";
import { createLogger } from "@docenrich/logger";
import type { IEmbeddingProvider } from "@docenrich/embeddings";
import type { IGenerationClient } from "@docenrich/stages";
import { MemoryVectorStore } from "@docenrich/vector-store";
import type { AnswerDependencies } from "@docenrich/core";
import { captureOutput } from "../test-helpers.js";
import { processChat } from "./chat.js";

const logger = createLogger({ level: "silent", pretty: false, fd: 2 });
const HEADER = 'Ask about the documents in "docs". Type "exit" to quit.\n';

async function chatDeps(generate: Mock<IGenerationClient["generate"]>): Promise<AnswerDependencies> {
  const vectorStore = new MemoryVectorStore();
  await vectorStore.ensureCollection("docs", 2);
  await vectorStore.upsert("docs", [
    { id: "a", vector: [1, 0], payload: { chunkId: "a", documentId: "doc_1", text: "Plants grow." } },
  ]);

  const result = { embeddings: [[1, 0]], model: "fake", tokensUsed: 0, dimensions: 2 };
  const embeddingProvider: IEmbeddingProvider = {
    name: "fake",
    dimensions: 2,
    embed: vi.fn(async () => result),
    batchEmbed: vi.fn(async () => result),
  };

  return {
    embeddingProvider,
    vectorStore,
    generator: { generate },
    collectionName: "docs",
    rag: { topK: 1, temperature: 0.1, promptTemplate: "{{context}}\n{{question}}" },
    logger,
  };
}

describe("processChat", () => {
  it("answers each question and stops at quit", async () => {
    const generate = vi.fn<IGenerationClient["generate"]>().mockResolvedValue("  They grow in light. ");
    const input = new PassThrough();
    const output = captureOutput();

    input.end("What grows?\nquit\nNever asked?\n");
    await processChat(await chatDeps(generate), { input, output: output.stream });

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith("Plants grow.\nWhat grows?", { temperature: 0.1 });
    expect(output.text()).toBe(`${HEADER}> They grow in light.\n  [1.000] doc_1 a\n> `);
  });

  it("reports a failed turn and keeps going", async () => {
    const generate = vi
      .fn<IGenerationClient["generate"]>()
      .mockRejectedValueOnce(new Error("generation offline"))
      .mockResolvedValue("They grow in light.");
    const input = new PassThrough();
    const output = captureOutput();

    input.end("First?\n\nSecond?\n");
    await processChat(await chatDeps(generate), { input, output: output.stream });

    expect(generate).toHaveBeenCalledTimes(2);
    expect(output.text()).toBe(
      `${HEADER}> Error: generation offline\n> > They grow in light.\n  [1.000] doc_1 a\n> `,
    );
  });
});
