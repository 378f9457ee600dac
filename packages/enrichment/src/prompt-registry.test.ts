import { describe, it, expect } from "vitest";
import { ConfigError } from "@docenrich/errors";
import { PromptRegistry } from "./prompt-registry.js";
import { DEFAULT_TEMPLATES, PROMPT_IDS } from "./prompts.js";
import { questionsSchema } from "./schemas.js";

describe("PromptRegistry", () => {
  it("ships a template with both placeholders for every prompt", () => {
    for (const id of PROMPT_IDS) {
      expect(DEFAULT_TEMPLATES[id]).toContain("{{text}}");
      expect(DEFAULT_TEMPLATES[id]).toContain("{{language}}");
    }
  });

  it("renders text and language into the template", () => {
    const registry = new PromptRegistry({ questions: "[{{language}}] Ask about: {{text}}" });

    expect(registry.render("questions", { text: "Solar panels", language: "en" })).toBe(
      "[en] Ask about: Solar panels",
    );
  });

  it("inserts text literally, including replacement patterns and placeholders", () => {
    const registry = new PromptRegistry({ questions: "{{language}}: {{text}}" });

    expect(registry.render("questions", { text: "costs $& {{language}}", language: "de" })).toBe(
      "de: costs $& {{language}}",
    );
  });

  it("keeps the fixed schema when a template is overridden", () => {
    const registry = new PromptRegistry({ questions: "Q {{text}}" });

    const definition = registry.get("questions");

    expect(definition.template).toBe("Q {{text}}");
    expect(definition.schema).toBe(questionsSchema);
  });

  it("falls back to the built-in template when no override is given", () => {
    expect(new PromptRegistry().get("summary-keywords").template).toBe(
      DEFAULT_TEMPLATES["summary-keywords"],
    );
  });

  it("rejects an override without the text placeholder", () => {
    expect(() => new PromptRegistry({ "semantic-chunking": "Split it." })).toThrow(ConfigError);
  });
});
