import type { ZodType, ZodTypeDef } from "zod";
import type { PromptId } from "@docenrich/types";
import { ConfigError } from "@docenrich/errors";
import { DEFAULT_TEMPLATES, PROMPT_IDS } from "./prompts.js";
import { OUTPUT_SCHEMAS, type PromptOutputs } from "./schemas.js";

export interface PromptVariables {
  text: string;
  language: string;
}

export interface PromptDefinition<K extends PromptId> {
  id: K;
  template: string;
  schema: ZodType<PromptOutputs[K], ZodTypeDef, unknown>;
}

/**
 * Fixed set of prompt templates and their output schemas. Template texts can be
 * replaced from configuration; schemas cannot.
 */
export class PromptRegistry {
  private readonly templates: Record<PromptId, string>;

  constructor(overrides: Partial<Record<PromptId, string>> = {}) {
    this.templates = { ...DEFAULT_TEMPLATES };
    for (const id of PROMPT_IDS) {
      const override = overrides[id];
      if (override === undefined) continue;
      if (!override.includes("{{text}}")) {
        throw new ConfigError(`Prompt override "${id}" must contain the {{text}} placeholder`, {
          details: { promptId: id },
        });
      }
      this.templates[id] = override;
    }
  }

  get<K extends PromptId>(id: K): PromptDefinition<K> {
    return { id, template: this.templates[id], schema: OUTPUT_SCHEMAS[id] };
  }

  render(id: PromptId, variables: PromptVariables): string {
    return this.templates[id]
      .replaceAll("{{language}}", () => variables.language)
      .replaceAll("{{text}}", () => variables.text);
  }
}
