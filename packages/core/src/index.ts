export { runPipeline, raceAbort } from "./orchestrator.js";
export type { PipelineDependencies, PipelineSettings, ChunkEnricher } from "./orchestrator.js";

export { reconcile, deduplicate, mergedIds } from "./chunk-reconciler.js";
export type { ChunkInput, ReconcileOutcome, DeduplicationResult } from "./chunk-reconciler.js";

export { computeChunkId, computeDocumentId, normalizeText, formatAsUuid } from "./chunk-identity.js";
export { ConcurrentPool } from "./concurrent-pool.js";
export type { PoolOptions } from "./concurrent-pool.js";

export { StoreWriter, buildPayload, entitiesInText } from "./store-writer.js";
export type { StoreWriterOptions } from "./store-writer.js";

export { FileRunLog, MemoryRunLog } from "./run-log.js";
export type { IRunLog, RunLogEvent } from "./run-log.js";

export { answer, renderAnswerPrompt, NO_ANSWER } from "./retrieval.js";
export type { AnswerDependencies, AnswerResult } from "./retrieval.js";
export { assembleContext, toScoredChunk, CONTEXT_SEPARATOR } from "./context-assembler.js";
export type { ScoredChunk } from "./context-assembler.js";
