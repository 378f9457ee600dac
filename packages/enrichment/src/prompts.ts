import type { PromptId } from "@docenrich/types";

export const PROMPT_IDS: readonly PromptId[] = [
  "semantic-chunking",
  "summary-keywords",
  "questions",
  "key-sentences-metadata",
];

const JSON_ONLY = "Reply with valid JSON only, without explanations or Markdown.";

/** Built-in templates. `{{text}}` and `{{language}}` are filled in at render time. */
export const DEFAULT_TEMPLATES: Record<PromptId, string> = {
  "semantic-chunking": `You split documents into semantically coherent sections for a search index.
Split the following text (language: {{language}}) into sections that each cover one topic.
Copy every section word for word from the text. Do not summarize, translate or reorder.
${JSON_ONLY}
Return a JSON array of strings, one string per section.

Text:
{{text}}`,

  "summary-keywords": `Summarize the following text in at most three sentences and extract
three to five keywords. Write in the language of the text ({{language}}).
${JSON_ONLY}
Return a JSON object: {"summary": "...", "keywords": ["...", "...", "..."]}

Text:
{{text}}`,

  questions: `Write two or three questions that the following text answers.
Write them in the language of the text ({{language}}).
${JSON_ONLY}
Return a JSON array of question strings.

Text:
{{text}}`,

  "key-sentences-metadata": `Analyse the following text (language: {{language}}).
Pick one to three key sentences, copied verbatim. Name the main topic, the overall
sentiment (one of "positive", "neutral", "negative", "mixed") and the named entities
with their type (for example PERSON, ORGANIZATION, LOCATION, DATE).
${JSON_ONLY}
Return a JSON object:
{"key_sentences": ["..."], "metadata": {"main_topic": "...", "sentiment": "neutral", "named_entities": [{"name": "...", "type": "..."}]}}

Text:
{{text}}`,
};
