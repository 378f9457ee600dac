import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileRunLog, MemoryRunLog, type RunLogEvent } from "./run-log.js";

const TRANSITION: RunLogEvent = {
  type: "transition",
  runId: "run-1",
  from: null,
  to: "Ingested",
  at: "2026-01-01T00:00:00.000Z",
};

const CHUNK_EVENT: RunLogEvent = {
  type: "chunk",
  runId: "run-1",
  chunkId: "chunk-1",
  order: 0,
  outcome: "partial-failed",
  at: "2026-01-01T00:00:01.000Z",
  code: "RECONCILE_INCOMPLETE",
  reason: "questions missing",
};

describe("FileRunLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docenrich-runlog-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per event to <dir>/<documentId>.jsonl", async () => {
    const log = new FileRunLog(join(dir, "runs"));

    await log.append("doc_1", TRANSITION);
    await log.append("doc_1", CHUNK_EVENT);

    const content = await readFile(join(dir, "runs", "doc_1.jsonl"), "utf8");
    const lines = content.trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines.map((line) => JSON.parse(line))).toEqual([TRANSITION, CHUNK_EVENT]);
  });

  it("keeps documents in separate files", async () => {
    const log = new FileRunLog(dir);

    await log.append("doc_1", TRANSITION);
    await log.append("doc_2", TRANSITION);

    expect(await readFile(join(dir, "doc_2.jsonl"), "utf8")).toBe(`${JSON.stringify(TRANSITION)}\n`);
  });
});

describe("MemoryRunLog", () => {
  it("filters events by type", async () => {
    const log = new MemoryRunLog();
    await log.append("doc_1", TRANSITION);
    await log.append("doc_1", CHUNK_EVENT);

    expect(log.ofType("chunk")).toEqual([CHUNK_EVENT]);
    expect(log.ofType("summary")).toEqual([]);
  });
});
