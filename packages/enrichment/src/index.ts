export {
  recover,
  toRecoveryError,
  extractCandidate,
  extractCandidates,
  stripCodeFences,
  parseWithRepairs,
  coerceToSchema,
} from "./json-recovery.js";
export type { RecoveryResult, RecoveryFailure, RepairName } from "./json-recovery.js";

export {
  semanticChunkingSchema,
  summaryKeywordsSchema,
  questionsSchema,
  keySentencesMetadataSchema,
  countSentences,
  OUTPUT_SCHEMAS,
} from "./schemas.js";
export type { PromptOutputs, SummaryKeywordsOutput, KeySentencesMetadataOutput } from "./schemas.js";

export { DEFAULT_TEMPLATES, PROMPT_IDS } from "./prompts.js";
export { PromptRegistry } from "./prompt-registry.js";
export type { PromptDefinition, PromptVariables } from "./prompt-registry.js";

export { Enricher } from "./enricher.js";
export type {
  EnricherOptions,
  EnrichmentResults,
  EnrichableChunk,
  SlotOutcome,
} from "./enricher.js";
