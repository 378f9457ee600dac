import type { Chunk, EnrichmentBundle, NamedEntity, ReconciledChunk } from "@docenrich/types";
import { ReconcileIncompleteError, type AppError, type MissingEnrichment } from "@docenrich/errors";
import type { EnrichmentResults, SlotOutcome } from "@docenrich/enrichment";
import { computeChunkId, normalizeText } from "./chunk-identity.js";

export interface ChunkInput {
  documentId: string;
  order: number;
  text: string;
  language: string;
}

export type ReconcileOutcome =
  | { status: "reconciled"; chunk: ReconciledChunk }
  | { status: "partial-failed"; chunk: Chunk; error: AppError; duplicateOf: string[] };

/** Ids of the later chunks folded into this outcome. */
export function mergedIds(outcome: ReconcileOutcome): string[] {
  return outcome.status === "reconciled" ? outcome.chunk.duplicateOf : outcome.duplicateOf;
}

export interface DeduplicationResult {
  outcomes: ReconcileOutcome[];
  /** Number of chunks folded into an earlier chunk with the same normalized text. */
  mergedDuplicates: number;
}

function missingSlot(
  slot: keyof EnrichmentResults,
  outcome: SlotOutcome<unknown> | undefined,
): MissingEnrichment | undefined {
  if (outcome === undefined) return { slot, code: "MISSING", reason: "no result was produced" };
  if (!outcome.ok) return { slot, code: outcome.error.code, reason: outcome.error.message };
  return undefined;
}

/**
 * Merge the four enrichment results of one chunk into a bundle. Any missing or
 * failed slot makes the chunk `partial-failed`; nothing is filled with defaults.
 */
export function reconcile(
  input: ChunkInput,
  results: Partial<EnrichmentResults>,
): ReconcileOutcome {
  const chunk: Chunk = {
    id: computeChunkId(input.documentId, input.order, input.text),
    documentId: input.documentId,
    order: input.order,
    text: input.text,
    language: input.language,
  };

  const { summaryKeywords, questions, keySentences, metadata } = results;
  if (summaryKeywords?.ok && questions?.ok && keySentences?.ok && metadata?.ok) {
    const bundle: EnrichmentBundle = {
      summary: summaryKeywords.value.summary,
      keywords: summaryKeywords.value.keywords,
      questions: questions.value,
      keySentences: keySentences.value,
      metadata: metadata.value,
    };
    return { status: "reconciled", chunk: { ...chunk, bundle, duplicateOf: [] } };
  }

  const missing = [
    missingSlot("summaryKeywords", summaryKeywords),
    missingSlot("questions", questions),
    missingSlot("keySentences", keySentences),
    missingSlot("metadata", metadata),
  ].filter((m): m is MissingEnrichment => m !== undefined);

  return {
    status: "partial-failed",
    chunk,
    error: new ReconcileIncompleteError(chunk.id, missing),
    duplicateOf: [],
  };
}

function unionBy<T>(values: readonly T[], key: (value: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const value of values) {
    const k = key(value);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(value);
  }
  return out;
}

function mergeBundles(bundles: readonly EnrichmentBundle[]): EnrichmentBundle {
  const [first, ...rest] = bundles;
  if (first === undefined) throw new RangeError("mergeBundles needs at least one bundle");
  const all = [first, ...rest];

  return {
    summary: first.summary,
    keywords: unionBy(
      all.flatMap((b) => b.keywords),
      (k) => normalizeText(k).toLowerCase(),
    ),
    questions: unionBy(all.flatMap((b) => b.questions), normalizeText),
    keySentences: unionBy(all.flatMap((b) => b.keySentences), normalizeText),
    metadata: {
      mainTopic: first.metadata.mainTopic,
      sentiment: first.metadata.sentiment,
      namedEntities: unionBy(
        all.flatMap((b) => b.metadata.namedEntities),
        (e: NamedEntity) => `${e.name}\0${e.type}`,
      ),
    },
  };
}

/**
 * Collapse chunks whose normalized text is identical into the first occurrence,
 * which keeps its id and order. The merged record is complete when any of the
 * duplicates is.
 */
export function deduplicate(outcomes: readonly ReconcileOutcome[]): DeduplicationResult {
  const groups = new Map<string, ReconcileOutcome[]>();
  for (const outcome of [...outcomes].sort((a, b) => a.chunk.order - b.chunk.order)) {
    const key = normalizeText(outcome.chunk.text);
    const group = groups.get(key);
    if (group) group.push(outcome);
    else groups.set(key, [outcome]);
  }

  const merged: ReconcileOutcome[] = [];
  let mergedDuplicates = 0;

  for (const [head, ...rest] of groups.values()) {
    if (head === undefined) continue;
    mergedDuplicates += rest.length;
    const duplicateOf = rest.map((o) => o.chunk.id);

    const complete: EnrichmentBundle[] = [];
    for (const o of [head, ...rest]) {
      if (o.status === "reconciled") complete.push(o.chunk.bundle);
    }

    if (complete.length === 0) {
      merged.push({ ...head, duplicateOf });
      continue;
    }

    const base: Chunk = {
      id: head.chunk.id,
      documentId: head.chunk.documentId,
      order: head.chunk.order,
      text: head.chunk.text,
      language: head.chunk.language,
    };
    merged.push({
      status: "reconciled",
      chunk: { ...base, bundle: mergeBundles(complete), duplicateOf },
    });
  }

  return { outcomes: merged, mergedDuplicates };
}
