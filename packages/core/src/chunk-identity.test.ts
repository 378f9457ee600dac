import { describe, it, expect } from "vitest";
import { computeChunkId, computeDocumentId, formatAsUuid, normalizeText } from "./chunk-identity.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("normalizeText", () => {
  it("composes to NFC, collapses whitespace and trims", () => {
    expect(normalizeText("  Cafe\u0301 \n\t bar ")).toBe("Caf\u00e9 bar");
  });
});

describe("formatAsUuid", () => {
  it("groups the first 32 hex chars as 8-4-4-4-12", () => {
    expect(formatAsUuid("0123456789abcdef0123456789abcdefffff")).toBe(
      "01234567-89ab-cdef-0123-456789abcdef",
    );
  });
});

describe("computeDocumentId", () => {
  it("is doc_ plus the first 16 hex chars of the SHA-256", () => {
    expect(computeDocumentId(new Uint8Array())).toBe("doc_e3b0c44298fc1c14");
  });

  it("depends only on the bytes", () => {
    const a = computeDocumentId(new TextEncoder().encode("%PDF-1.4 one"));
    const b = computeDocumentId(new TextEncoder().encode("%PDF-1.4 one"));
    const c = computeDocumentId(new TextEncoder().encode("%PDF-1.4 two"));
    expect(a).toBe(b);
    expect(a).not.toBe(c);
  });
});

describe("computeChunkId", () => {
  it("renders a UUID", () => {
    expect(computeChunkId("doc_1", 0, "Some text.")).toMatch(UUID);
  });

  it("ignores whitespace and normalization differences", () => {
    expect(computeChunkId("doc_1", 3, "Caf\u00e9  au lait")).toBe(
      computeChunkId("doc_1", 3, " Cafe\u0301 au\nlait "),
    );
  });

  it("changes with the order and the document", () => {
    const id = computeChunkId("doc_1", 0, "Same text.");
    expect(computeChunkId("doc_1", 1, "Same text.")).not.toBe(id);
    expect(computeChunkId("doc_2", 0, "Same text.")).not.toBe(id);
  });
});
