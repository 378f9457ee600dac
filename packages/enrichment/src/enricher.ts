import type { ChunkMetadata, PromptId } from "@docenrich/types";
import type { Logger } from "@docenrich/logger";
import { abortReason, toAppError, type AppError } from "@docenrich/errors";
import type { IGenerationClient } from "@docenrich/stages";
import { recover, toRecoveryError } from "./json-recovery.js";
import type { PromptRegistry } from "./prompt-registry.js";
import type { PromptOutputs, SummaryKeywordsOutput } from "./schemas.js";

export type SlotOutcome<T> = { ok: true; value: T } | { ok: false; error: AppError };

/** The four result slots filled for every chunk. */
export interface EnrichmentResults {
  summaryKeywords: SlotOutcome<SummaryKeywordsOutput>;
  questions: SlotOutcome<string[]>;
  keySentences: SlotOutcome<string[]>;
  metadata: SlotOutcome<ChunkMetadata>;
}

export interface EnrichableChunk {
  id: string;
  text: string;
  language: string;
}

export interface EnricherOptions {
  generator: IGenerationClient;
  registry: PromptRegistry;
  /** Fresh generations allowed after a recovery failure. */
  recoveryAttempts: number;
  logger: Logger;
  temperature?: number;
}

function settle<T, U>(result: PromiseSettledResult<T>, map: (value: T) => U): SlotOutcome<U> {
  return result.status === "fulfilled"
    ? { ok: true, value: map(result.value) }
    : { ok: false, error: toAppError(result.reason) };
}

/**
 * Runs the enrichment prompts against the generation stage. Every call is
 * generate → recover; output that cannot be recovered triggers a new generation.
 */
export class Enricher {
  private readonly generator: IGenerationClient;
  private readonly registry: PromptRegistry;
  private readonly recoveryAttempts: number;
  private readonly logger: Logger;
  private readonly temperature?: number;

  constructor(options: EnricherOptions) {
    this.generator = options.generator;
    this.registry = options.registry;
    this.recoveryAttempts = options.recoveryAttempts;
    this.logger = options.logger;
    this.temperature = options.temperature;
  }

  async runPrompt<K extends PromptId>(
    id: K,
    text: string,
    language: string,
    signal?: AbortSignal,
  ): Promise<PromptOutputs[K]> {
    const { schema } = this.registry.get(id);
    const prompt = this.registry.render(id, { text, language });
    const generations = this.recoveryAttempts + 1;

    for (let generation = 1; ; generation++) {
      if (signal?.aborted) throw abortReason(signal);

      const raw = await this.generator.generate(prompt, { temperature: this.temperature, signal });
      const result = recover(raw, schema);

      switch (result.kind) {
        case "valid":
          if (result.repairs.length > 0) {
            this.logger.debug({ promptId: id, repairs: result.repairs }, "Repaired generated JSON");
          }
          return result.value;
        case "unparseable":
        case "schema-mismatch": {
          const error = toRecoveryError(result, { promptId: id, generation });
          this.logger.warn(
            { promptId: id, generation, generations, code: error.code, err: error },
            "Generated output could not be recovered",
          );
          if (generation >= generations) throw error;
          break;
        }
      }
    }
  }

  /** Split one pre-split window into chunk strings. */
  chunkWindow(windowText: string, language: string, signal?: AbortSignal): Promise<string[]> {
    return this.runPrompt("semantic-chunking", windowText, language, signal);
  }

  /**
   * Issue the three per-chunk prompts in parallel. `key-sentences-metadata`
   * fills two slots, so its failure fails both.
   */
  async enrichChunk(chunk: EnrichableChunk, signal?: AbortSignal): Promise<EnrichmentResults> {
    const log = this.logger.child({ chunkId: chunk.id });
    const [summaryKeywords, questions, keySentencesMetadata] = await Promise.allSettled([
      this.runPrompt("summary-keywords", chunk.text, chunk.language, signal),
      this.runPrompt("questions", chunk.text, chunk.language, signal),
      this.runPrompt("key-sentences-metadata", chunk.text, chunk.language, signal),
    ]);

    const results: EnrichmentResults = {
      summaryKeywords: settle(summaryKeywords, (value) => value),
      questions: settle(questions, (value) => value),
      keySentences: settle(keySentencesMetadata, (value) => value.key_sentences),
      metadata: settle(keySentencesMetadata, ({ metadata }) => ({
        mainTopic: metadata.main_topic,
        sentiment: metadata.sentiment,
        namedEntities: metadata.named_entities,
      })),
    };

    const slots: [keyof EnrichmentResults, SlotOutcome<unknown>][] = [
      ["summaryKeywords", results.summaryKeywords],
      ["questions", results.questions],
      ["keySentences", results.keySentences],
      ["metadata", results.metadata],
    ];
    const failed = slots.filter(([, outcome]) => !outcome.ok).map(([slot]) => slot);
    if (failed.length > 0) {
      log.warn({ failedSlots: failed }, "Chunk enrichment incomplete");
    } else {
      log.debug("Chunk enriched");
    }
    return results;
  }
}
