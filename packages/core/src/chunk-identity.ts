import { createHash } from "node:crypto";

/** NFC, whitespace runs collapsed to one space, trimmed. */
export function normalizeText(text: string): string {
  return text.normalize("NFC").replace(/\s+/gu, " ").trim();
}

function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Renders the first 32 hex chars as 8-4-4-4-12 so Qdrant accepts it as a point id. */
export function formatAsUuid(hex: string): string {
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

/** Deterministic in the PDF bytes: re-ingesting a file yields the same id. */
export function computeDocumentId(bytes: Uint8Array): string {
  return `doc_${sha256Hex(bytes).slice(0, 16)}`;
}

export function computeChunkId(documentId: string, order: number, text: string): string {
  return formatAsUuid(sha256Hex(`${documentId}\0${String(order)}\0${normalizeText(text)}`));
}
