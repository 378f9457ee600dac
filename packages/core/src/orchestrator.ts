import { randomUUID } from "node:crypto";
import type {
  Chunk,
  ChunkOutcome,
  Document,
  DocumentAnnotation,
  DocumentSource,
  ExitCode,
  PipelineRun,
  PipelineState,
  ReconciledChunk,
  RunSummary,
  StageName,
  StageStatus,
} from "@docenrich/types";
import { preview, type Logger } from "@docenrich/logger";
import {
  AppError,
  DeadlineExceededError,
  StageRejectedError,
  StageUnreachableError,
  abortReason,
  toAppError,
} from "@docenrich/errors";
import type { IAnnotator, ILanguageDetector, IStructurer, StageResult } from "@docenrich/stages";
import type { EnrichableChunk, EnrichmentResults } from "@docenrich/enrichment";
import { alignChunks, type ITextSplitter } from "@docenrich/chunker";
import { assertVectors, type IEmbeddingProvider } from "@docenrich/embeddings";
import { computeChunkId, computeDocumentId } from "./chunk-identity.js";
import { deduplicate, mergedIds, reconcile, type ReconcileOutcome } from "./chunk-reconciler.js";
import { ConcurrentPool } from "./concurrent-pool.js";
import type { IRunLog, RunLogEvent } from "./run-log.js";
import { buildPayload, type StoreWriter } from "./store-writer.js";

/** The part of the enricher the orchestrator drives. */
export interface ChunkEnricher {
  chunkWindow(windowText: string, language: string, signal?: AbortSignal): Promise<string[]>;
  enrichChunk(chunk: EnrichableChunk, signal?: AbortSignal): Promise<EnrichmentResults>;
}

export interface PipelineSettings {
  collectionName: string;
  /** Covers every stage up to the end of enrichment. */
  deadlineMs: number;
  /** Used when language detection cannot tell the language. */
  defaultLanguage: string;
  concurrency: number;
  batchSize: number;
}

export interface PipelineDependencies {
  languageDetector: ILanguageDetector;
  structurer: IStructurer;
  annotator: IAnnotator;
  splitter: ITextSplitter;
  enricher: ChunkEnricher;
  embeddingProvider: IEmbeddingProvider;
  storeWriter: StoreWriter;
  runLog: IRunLog;
  logger: Logger;
  settings: PipelineSettings;
}

interface EmbeddedChunk {
  chunk: ReconciledChunk;
  vector: number[];
}

function batches<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/** Settles with `promise`, or rejects with the abort reason as soon as `signal` aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function attemptsOf(error: AppError): number {
  return error instanceof StageUnreachableError ? error.attempts : 1;
}

/**
 * One document run. Holds the PipelineRun; enrichment workers hand their
 * results back and never touch it.
 */
class PipelineExecution {
  private readonly deps: PipelineDependencies;
  private readonly source: DocumentSource;
  private readonly run: PipelineRun;
  private readonly log: Logger;
  private readonly controller = new AbortController();
  private activeStage: StageName = "languageDetection";
  private chunkCount = 0;
  private mergedDuplicates = 0;

  constructor(deps: PipelineDependencies, source: DocumentSource) {
    this.deps = deps;
    this.source = source;

    const runId = randomUUID();
    const documentId = computeDocumentId(source.bytes);
    this.run = {
      runId,
      documentId,
      sourcePath: source.path,
      state: "Ingested",
      stages: {
        languageDetection: "pending",
        structuring: "pending",
        annotation: "pending",
        chunking: "pending",
        enrichment: "pending",
        embedding: "pending",
        storage: "pending",
      },
      errors: [],
      chunkOutcomes: new Map(),
      startedAt: new Date(),
    };
    this.log = deps.logger.child({ runId, documentId });
  }

  async execute(): Promise<RunSummary> {
    const { deadlineMs } = this.deps.settings;
    const timer = setTimeout(() => {
      this.controller.abort(new DeadlineExceededError(deadlineMs, this.activeStage));
    }, deadlineMs);

    try {
      this.log.info({ sourcePath: this.source.path }, "Pipeline run started");
      await this.record({
        type: "transition",
        runId: this.run.runId,
        from: null,
        to: "Ingested",
        at: now(),
      });

      const { document, annotation } = await this.prepareDocument();
      const chunks = await this.runStage("chunking", async (signal) => ({
        value: await this.chunkDocument(document, signal),
        attempts: 1,
      }));
      this.chunkCount = chunks.length;
      await this.transition("Chunked");

      await this.transition("Enriching");
      const complete = await this.enrich(chunks);
      clearTimeout(timer);

      const embedded = await this.embed(complete);
      await this.transition("Embedded");

      await this.store(embedded, annotation);
      await this.transition("Stored");
    } catch (err) {
      if (this.run.state !== "Failed") throw err;
    } finally {
      clearTimeout(timer);
    }

    return this.finish();
  }

  private async prepareDocument(): Promise<{ document: Document; annotation: DocumentAnnotation }> {
    const { languageDetector, structurer, annotator, settings } = this.deps;

    const detected = await this.runStage("languageDetection", (signal) =>
      languageDetector.detect(this.source, signal),
    );
    let language = detected;
    if (!language) {
      this.log.warn(
        { defaultLanguage: settings.defaultLanguage },
        "Language could not be detected, falling back to default",
      );
      language = settings.defaultLanguage;
    }
    await this.transition("LanguageDetected");

    const structured = await this.runStage("structuring", async (signal) => {
      const result = await structurer.structure(this.source, signal);
      const structuredText = result.value.structuredText.normalize("NFC");
      if (structuredText.trim() === "") {
        throw new StageRejectedError("structuring", "document contains no text blocks");
      }
      return { value: { structuredText, blocks: result.value.blocks }, attempts: result.attempts };
    });

    const document: Document = Object.freeze({
      id: this.run.documentId,
      sourcePath: this.source.path,
      language,
      structuredText: structured.structuredText,
      blocks: Object.freeze([...structured.blocks]),
    });
    this.log.info(
      { language, blocks: document.blocks.length, chars: document.structuredText.length },
      "Document structured",
    );
    await this.transition("Structured");

    const annotation = await this.runStage("annotation", (signal) =>
      annotator.annotate(document.structuredText, document.language, signal),
    );
    this.log.info({ entities: annotation.entities.length }, "Document annotated");
    await this.transition("Annotated");

    return { document, annotation };
  }

  private async chunkDocument(document: Document, signal: AbortSignal): Promise<Chunk[]> {
    const { splitter, enricher } = this.deps;
    const windows = splitter.split(document.structuredText);
    const chunks: Chunk[] = [];

    for (const window of windows) {
      const candidates = await enricher.chunkWindow(window.text, document.language, signal);
      const { chunks: aligned, dropped } = alignChunks(window.text, candidates);
      if (dropped.length > 0) {
        this.log.warn(
          { window: window.index, dropped: dropped.map((d) => preview(d, 80)) },
          "Dropped chunk strings that do not occur in the document",
        );
      }
      for (const { text } of aligned) {
        const order = chunks.length;
        chunks.push({
          id: computeChunkId(document.id, order, text),
          documentId: document.id,
          order,
          text,
          language: document.language,
        });
      }
    }

    if (chunks.length === 0) {
      throw new AppError({
        message: "No chunk could be located in the document text",
        statusCode: 422,
        code: "NO_CHUNKS",
        details: { windows: windows.length },
      });
    }
    this.log.info({ windows: windows.length, chunks: chunks.length }, "Document chunked");
    return chunks;
  }

  /** Enrich and reconcile every chunk; returns the complete, de-duplicated ones in order. */
  private async enrich(chunks: readonly Chunk[]): Promise<ReconciledChunk[]> {
    const { enricher, settings } = this.deps;
    const signal = this.controller.signal;
    this.activeStage = "enrichment";

    const results = new Map<string, ReconcileOutcome>();
    let accepting = true;

    const pool = ConcurrentPool.run(
      chunks,
      settings.concurrency,
      async (chunk): Promise<ReconcileOutcome> => {
        try {
          return reconcile(chunk, await enricher.enrichChunk(chunk, signal));
        } catch (err) {
          return { status: "partial-failed", chunk, error: toAppError(err), duplicateOf: [] };
        }
      },
      {
        signal,
        onItemComplete: (outcome) => {
          // late results after the deadline are discarded
          if (accepting) results.set(outcome.chunk.id, outcome);
        },
      },
    );

    try {
      await raceAbort(pool, signal);
    } catch (err) {
      if (!signal.aborted) throw err;
      this.log.warn(
        { completed: results.size, pending: chunks.length - results.size },
        "Deadline expired during enrichment",
      );
    } finally {
      accepting = false;
    }

    const outcomes = chunks.map(
      (chunk): ReconcileOutcome =>
        results.get(chunk.id) ?? {
          status: "partial-failed",
          chunk,
          error: new DeadlineExceededError(settings.deadlineMs, "enrichment"),
          duplicateOf: [],
        },
    );

    for (const outcome of outcomes) {
      if (outcome.status === "reconciled") {
        await this.setChunkOutcome(outcome.chunk, "reconciled");
      } else {
        await this.failChunk(outcome.chunk, "enrichment", outcome.error);
      }
    }

    const deduplicated = deduplicate(outcomes);
    this.mergedDuplicates = deduplicated.mergedDuplicates;
    for (const outcome of deduplicated.outcomes) {
      for (const mergedId of mergedIds(outcome)) {
        this.run.chunkOutcomes.delete(mergedId);
      }
      const previous = this.run.chunkOutcomes.get(outcome.chunk.id);
      if (outcome.status === "reconciled" && previous?.status !== "reconciled") {
        // a duplicate completed a chunk whose own enrichment failed
        await this.setChunkOutcome(outcome.chunk, "reconciled");
      }
    }
    if (deduplicated.mergedDuplicates > 0) {
      this.log.info({ merged: deduplicated.mergedDuplicates }, "Merged duplicate chunks");
    }

    const complete: ReconciledChunk[] = [];
    for (const outcome of deduplicated.outcomes) {
      if (outcome.status === "reconciled") complete.push(outcome.chunk);
    }
    await this.markStage("enrichment", complete.length > 0 ? "succeeded" : "failed", 1);
    return complete;
  }

  private async embed(chunks: readonly ReconciledChunk[]): Promise<EmbeddedChunk[]> {
    const { embeddingProvider, settings } = this.deps;
    this.activeStage = "embedding";
    const embedded: EmbeddedChunk[] = [];
    let failedBatches = 0;

    for (const batch of batches(chunks, settings.batchSize)) {
      try {
        const result = await embeddingProvider.batchEmbed(
          batch.map((c) => c.text),
          { inputType: "document" },
        );
        assertVectors(
          embeddingProvider.name,
          result.embeddings,
          batch.length,
          embeddingProvider.dimensions,
        );
        result.embeddings.forEach((vector, i) => {
          const chunk = batch[i];
          if (chunk) embedded.push({ chunk, vector });
        });
      } catch (err) {
        failedBatches++;
        const error = toAppError(err);
        for (const chunk of batch) {
          await this.failChunk(chunk, "embedding", error);
        }
      }
    }

    const status = failedBatches > 0 && embedded.length === 0 ? "failed" : "succeeded";
    await this.markStage("embedding", status, 1);
    this.log.info({ embedded: embedded.length, failedBatches }, "Chunks embedded");
    return embedded;
  }

  private async store(
    embedded: readonly EmbeddedChunk[],
    annotation: DocumentAnnotation,
  ): Promise<void> {
    const { storeWriter, embeddingProvider, settings } = this.deps;
    this.activeStage = "storage";
    let stored = 0;

    if (embedded.length > 0) {
      try {
        await storeWriter.ensureCollection(settings.collectionName, embeddingProvider.dimensions);
      } catch (err) {
        const error = toAppError(err);
        for (const { chunk } of embedded) {
          await this.failChunk(chunk, "storage", error);
        }
        await this.markStage("storage", "failed", 1, error);
        return;
      }
    }

    for (const batch of batches(embedded, settings.batchSize)) {
      try {
        await storeWriter.upsertMany(
          batch.map(({ chunk, vector }) => ({
            collectionName: settings.collectionName,
            chunkId: chunk.id,
            vector,
            payload: buildPayload(chunk, this.source.path, annotation.entities),
          })),
        );
        for (const { chunk } of batch) {
          await this.setChunkOutcome(chunk, "stored");
        }
        stored += batch.length;
      } catch (err) {
        const error = toAppError(err);
        for (const { chunk } of batch) {
          await this.failChunk(chunk, "storage", error);
        }
      }
    }

    await this.markStage("storage", embedded.length > 0 && stored === 0 ? "failed" : "succeeded", 1);
    this.log.info({ collectionName: settings.collectionName, stored }, "Chunks stored");
  }

  /** Run one pre-chunking stage; its failure fails the document. */
  private async runStage<T>(
    stage: StageName,
    call: (signal: AbortSignal) => Promise<StageResult<T>>,
  ): Promise<T> {
    this.activeStage = stage;
    const signal = this.controller.signal;

    try {
      const { value, attempts } = await raceAbort(call(signal), signal);
      await this.markStage(stage, attempts > 1 ? "retried" : "succeeded", attempts);
      return value;
    } catch (err) {
      const error = toAppError(err);
      await this.markStage(stage, "failed", attemptsOf(error), error);
      await this.fail(stage, error);
      throw error;
    }
  }

  private async markStage(
    stage: StageName,
    status: StageStatus,
    attempts: number,
    error?: AppError,
  ): Promise<void> {
    this.run.stages[stage] = status;
    await this.record({
      type: "stage",
      runId: this.run.runId,
      stage,
      status,
      attempts,
      at: now(),
      code: error?.code,
      reason: error?.message,
    });
  }

  private async transition(to: PipelineState, reason?: string): Promise<void> {
    const from = this.run.state;
    this.run.state = to;
    this.log.info({ from, to }, "Pipeline state changed");
    await this.record({ type: "transition", runId: this.run.runId, from, to, at: now(), reason });
  }

  private async fail(stage: StageName, error: AppError): Promise<void> {
    this.run.failedStage = stage;
    this.run.failureReason = error.message;
    this.run.errors.push({ stage, code: error.code, message: error.message });
    this.log.error({ stage, err: error }, "Pipeline run failed");
    await this.transition("Failed", error.message);
  }

  private async setChunkOutcome(chunk: Chunk, status: "reconciled" | "stored"): Promise<void> {
    const outcome: ChunkOutcome = { chunkId: chunk.id, order: chunk.order, status };
    this.run.chunkOutcomes.set(chunk.id, outcome);
    await this.record({
      type: "chunk",
      runId: this.run.runId,
      chunkId: chunk.id,
      order: chunk.order,
      outcome: status,
      at: now(),
    });
  }

  private async failChunk(chunk: Chunk, stage: StageName, error: AppError): Promise<void> {
    this.run.chunkOutcomes.set(chunk.id, {
      chunkId: chunk.id,
      order: chunk.order,
      status: "partial-failed",
      reason: error.message,
      code: error.code,
    });
    this.run.errors.push({ stage, code: error.code, message: error.message, chunkId: chunk.id });
    this.log.warn({ chunkId: chunk.id, order: chunk.order, stage, err: error }, "Chunk failed");
    await this.record({
      type: "chunk",
      runId: this.run.runId,
      chunkId: chunk.id,
      order: chunk.order,
      outcome: "partial-failed",
      at: now(),
      code: error.code,
      reason: error.message,
    });
  }

  private async record(event: RunLogEvent): Promise<void> {
    try {
      await this.deps.runLog.append(this.run.documentId, event);
    } catch (err) {
      this.log.error({ err, event: event.type }, "Failed to write run log event");
    }
  }

  private async finish(): Promise<RunSummary> {
    const outcomes = [...this.run.chunkOutcomes.values()].sort((a, b) => a.order - b.order);
    const failedChunks = outcomes
      .filter((o) => o.status === "partial-failed")
      .map((o) => ({
        chunkId: o.chunkId,
        order: o.order,
        code: o.code ?? "UNKNOWN",
        reason: o.reason ?? "",
      }));

    let exitCode: ExitCode = 0;
    if (this.run.state === "Failed") exitCode = 1;
    else if (failedChunks.length > 0) exitCode = 2;

    const summary: RunSummary = {
      runId: this.run.runId,
      documentId: this.run.documentId,
      sourcePath: this.run.sourcePath,
      state: this.run.state,
      failedStage: this.run.failedStage,
      reason: this.run.failureReason,
      chunkCount: this.chunkCount,
      storedChunkIds: outcomes.filter((o) => o.status === "stored").map((o) => o.chunkId),
      failedChunks,
      mergedDuplicates: this.mergedDuplicates,
      stages: { ...this.run.stages },
      durationMs: Date.now() - this.run.startedAt.getTime(),
      exitCode,
    };

    await this.record({
      type: "summary",
      runId: this.run.runId,
      at: now(),
      summary,
      partialFailedChunks: failedChunks,
    });
    this.log.info(
      {
        state: summary.state,
        exitCode,
        stored: summary.storedChunkIds.length,
        failed: failedChunks.length,
        durationMs: summary.durationMs,
      },
      "Pipeline run finished",
    );
    return summary;
  }
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Run one document through detection, structuring, annotation, chunking,
 * enrichment, embedding and storage.
 *
 * Resolves with the run summary in every case; a failed pre-chunking stage
 * yields `state: "Failed"` and exit code 1, failed chunks exit code 2.
 */
export function runPipeline(
  source: DocumentSource,
  deps: PipelineDependencies,
): Promise<RunSummary> {
  return new PipelineExecution(deps, source).execute();
}
