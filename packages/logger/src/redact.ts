/**
 * Log hygiene helpers: secret paths for pino's `redact` option and a preview
 * helper for document text and generated output.
 */

const SECRET_KEYS = ["apiKey", "qdrantApiKey", "authorization", "token", "password", "secret"];

/**
 * JSON paths suitable for Pino's `redact` option: each secret key at the top
 * level and one level down (e.g. `cohere.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [...SECRET_KEYS, ...SECRET_KEYS.map((key) => `*.${key}`)];

const DEFAULT_PREVIEW_CHARS = 200;

/**
 * Shorten text for a log line. Whitespace runs are collapsed so multi-line
 * model output stays on one line.
 */
export function preview(text: string, maxChars = DEFAULT_PREVIEW_CHARS): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxChars) return flat;
  return `${flat.slice(0, maxChars)}… (+${String(flat.length - maxChars)} chars)`;
}
