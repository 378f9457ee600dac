/**
 * JSON recovery for text-generation output.
 *
 * Models wrap JSON in prose and code fences, cut it off at the token limit and
 * get quoting wrong. `recover` extracts the most plausible JSON value, applies a
 * fixed sequence of textual repairs until it parses, coerces it toward the
 * expected zod schema and validates it. It never returns a partially valid value.
 */

import {
  ZodArray,
  ZodDefault,
  ZodEffects,
  ZodEnum,
  ZodNullable,
  ZodNumber,
  ZodObject,
  ZodOptional,
  ZodString,
  type ZodIssue,
  type ZodType,
  type ZodTypeAny,
  type ZodTypeDef,
} from "zod";
import {
  AppError,
  RecoverySchemaMismatchError,
  RecoveryUnparseableError,
} from "@docenrich/errors";

export type RepairName =
  | "smart-quotes"
  | "escape-string-contents"
  | "single-quotes"
  | "missing-commas"
  | "trailing-commas"
  | "truncated-array"
  | "balance-brackets";

export type RecoveryResult<T> =
  | { kind: "valid"; value: T; repairs: RepairName[] }
  | { kind: "unparseable"; reason: string }
  | { kind: "schema-mismatch"; issues: string[]; value: unknown };

export type RecoveryFailure = Exclude<RecoveryResult<unknown>, { kind: "valid" }>;

// ---------- Scanning ----------

interface Container {
  open: "{" | "[";
  index: number;
  /** Index of the last comma directly inside this container, -1 if none. */
  lastComma: number;
}

interface ScanResult {
  /** Index of the bracket that closes the opener at `from`, null when never closed. */
  closedAt: number | null;
  stack: Container[];
  inString: boolean;
}

function scan(text: string, from: number): ScanResult {
  const stack: Container[] = [];
  let inString = false;

  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      stack.push({ open: ch === "{" ? "{" : "[", index: i, lastComma: -1 });
    } else if (ch === "}" || ch === "]") {
      const top = stack[stack.length - 1];
      if (top && top.open === (ch === "}" ? "{" : "[")) {
        stack.pop();
        if (stack.length === 0) return { closedAt: i, stack, inString };
      }
    } else if (ch === ",") {
      const top = stack[stack.length - 1];
      if (top) top.lastComma = i;
    }
  }

  return { closedAt: null, stack, inString };
}

const FENCE = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)(?:```|$)/;

export function stripCodeFences(text: string): string {
  const match = FENCE.exec(text);
  return match ? (match[1] ?? "") : text;
}

/**
 * Every JSON candidate in free text, largest first: each balanced `{…}` or
 * `[…]` span, and everything from an opener that is never closed. Scanning
 * resumes after a balanced span, or right after an opener that never closes.
 */
export function extractCandidates(text: string): string[] {
  const found: string[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch !== "{" && ch !== "[") {
      i++;
      continue;
    }

    const { closedAt } = scan(text, i);
    found.push(text.slice(i, closedAt === null ? text.length : closedAt + 1));
    i = closedAt === null ? i + 1 : closedAt + 1;
  }

  return found.sort((a, b) => b.length - a.length);
}

/** The largest JSON candidate in free text, or null when there is none. */
export function extractCandidate(text: string): string | null {
  return extractCandidates(text)[0] ?? null;
}

// ---------- Repairs ----------

function nextSignificant(text: string, from: number): string | undefined {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch !== undefined && !/\s/.test(ch)) return ch;
  }
  return undefined;
}

function previousSignificant(out: string): string | undefined {
  for (let i = out.length - 1; i >= 0; i--) {
    const ch = out[i];
    if (ch !== undefined && !/\s/.test(ch)) return ch;
  }
  return undefined;
}

const CONTROL_ESCAPES: Record<string, string> = { "\n": "\\n", "\r": "\\r", "\t": "\\t" };

function escapeControl(ch: string): string {
  return CONTROL_ESCAPES[ch] ?? `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

function normalizeSmartQuotes(text: string): string {
  return text.replace(/[“”„‟″]/g, '"').replace(/[‘’‚‛′]/g, "'");
}

/**
 * Inside double-quoted strings, escape quotes that do not end the string and
 * raw control characters. A quote ends the string when the next significant
 * character is a delimiter.
 */
function escapeStringContents(text: string): string {
  let out = "";
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i] ?? "";
    if (!inString) {
      if (ch === '"') inString = true;
      out += ch;
      continue;
    }

    if (ch === "\\") {
      out += ch + (text[i + 1] ?? "");
      i++;
    } else if (ch === '"') {
      const next = nextSignificant(text, i + 1);
      if (next === undefined || ",}]:\"".includes(next)) {
        inString = false;
        out += ch;
      } else {
        out += '\\"';
      }
    } else if (ch.charCodeAt(0) < 0x20) {
      out += escapeControl(ch);
    } else {
      out += ch;
    }
  }

  return out;
}

/** Turn `'…'` strings in key or value position into double-quoted strings. */
function convertSingleQuotes(text: string): string {
  let out = "";
  let inDouble = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i] ?? "";
    if (inDouble) {
      if (ch === "\\") {
        out += ch + (text[i + 1] ?? "");
        i++;
        continue;
      }
      if (ch === '"') inDouble = false;
      out += ch;
      continue;
    }

    if (ch === '"') {
      inDouble = true;
      out += ch;
      continue;
    }

    const before = previousSignificant(out);
    if (ch !== "'" || (before !== undefined && !"{[,:".includes(before))) {
      out += ch;
      continue;
    }

    let content = "";
    let j = i + 1;
    let closed = false;
    for (; j < text.length; j++) {
      const c = text[j] ?? "";
      if (c === "\\" && text[j + 1] === "'") {
        content += "'";
        j++;
      } else if (c === "\\") {
        content += c + (text[j + 1] ?? "");
        j++;
      } else if (c === "'") {
        const next = nextSignificant(text, j + 1);
        if (next === undefined || ",}]:".includes(next)) {
          closed = true;
          break;
        }
        content += c;
      } else if (c === '"') {
        content += '\\"';
      } else {
        content += c;
      }
    }

    out += `"${content}${closed ? '"' : ""}`;
    i = j;
  }

  return out;
}

const LITERAL_CHAR = /[A-Za-z0-9.+\-]/;

/** Insert a comma between two adjacent values that lack one. */
function insertMissingCommas(text: string): string {
  let out = "";
  let afterValue = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i] ?? "";

    if (ch === '"') {
      if (afterValue) out += ",";
      let j = i + 1;
      for (; j < text.length; j++) {
        if (text[j] === "\\") j++;
        else if (text[j] === '"') break;
      }
      out += text.slice(i, j + 1);
      i = j;
      afterValue = true;
    } else if (ch === "{" || ch === "[") {
      if (afterValue) out += ",";
      out += ch;
      afterValue = false;
    } else if (ch === "}" || ch === "]") {
      out += ch;
      afterValue = true;
    } else if (ch === "," || ch === ":") {
      out += ch;
      afterValue = false;
    } else if (LITERAL_CHAR.test(ch)) {
      if (afterValue) out += ",";
      let j = i;
      while (j < text.length && LITERAL_CHAR.test(text[j] ?? "")) j++;
      out += text.slice(i, j);
      i = j - 1;
      afterValue = true;
    } else {
      out += ch;
    }
  }

  return out;
}

function removeTrailingCommas(text: string): string {
  let out = "";
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i] ?? "";
    if (inString) {
      if (ch === "\\") {
        out += ch + (text[i + 1] ?? "");
        i++;
        continue;
      }
      if (ch === '"') inString = false;
      out += ch;
      continue;
    }

    if (ch === '"') inString = true;
    if (ch === ",") {
      const next = nextSignificant(text, i + 1);
      if (next === undefined || next === "}" || next === "]") continue;
    }
    out += ch;
  }

  return out;
}

/**
 * When the text ends inside a string, drop that unterminated element from the
 * innermost open array, back to the array's last comma.
 */
function dropTruncatedArrayElement(text: string): string {
  const { closedAt, stack, inString } = scan(text, 0);
  if (closedAt !== null || !inString) return text;

  for (let k = stack.length - 1; k >= 0; k--) {
    const container = stack[k];
    if (container?.open === "[") {
      const cut = container.lastComma >= 0 ? container.lastComma : container.index + 1;
      return text.slice(0, cut);
    }
  }
  return text;
}

/** Close open brackets. Never closes an unterminated string. */
function balanceBrackets(text: string): string {
  const { closedAt, stack, inString } = scan(text, 0);
  if (closedAt !== null || inString || stack.length === 0) return text;

  let body = text.trimEnd();
  while (body.endsWith(",")) body = body.slice(0, -1).trimEnd();

  const top = stack[stack.length - 1];
  if (body.endsWith(":") && top) {
    // dangling key: drop it
    body = top.lastComma >= 0 ? text.slice(0, top.lastComma) : text.slice(0, top.index + 1);
  }

  let closers = "";
  for (let k = stack.length - 1; k >= 0; k--) {
    closers += stack[k]?.open === "{" ? "}" : "]";
  }
  return body + closers;
}

const REPAIRS: readonly { name: RepairName; apply: (text: string) => string }[] = [
  { name: "smart-quotes", apply: normalizeSmartQuotes },
  { name: "escape-string-contents", apply: escapeStringContents },
  { name: "single-quotes", apply: convertSingleQuotes },
  { name: "missing-commas", apply: insertMissingCommas },
  { name: "trailing-commas", apply: removeTrailingCommas },
  { name: "truncated-array", apply: dropTruncatedArrayElement },
  { name: "balance-brackets", apply: balanceBrackets },
];

type ParseOutcome = { ok: true; value: unknown } | { ok: false; message: string };

function tryParse(text: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

type RepairOutcome =
  | { ok: true; value: unknown; repairs: RepairName[] }
  | { ok: false; message: string };

/** Parse `candidate`, applying the repairs cumulatively until one parses. */
export function parseWithRepairs(candidate: string): RepairOutcome {
  let attempt = tryParse(candidate);
  if (attempt.ok) return { ok: true, value: attempt.value, repairs: [] };

  let text = candidate;
  const applied: RepairName[] = [];
  for (const repair of REPAIRS) {
    const repaired = repair.apply(text);
    if (repaired === text) continue;
    text = repaired;
    applied.push(repair.name);

    attempt = tryParse(text);
    if (attempt.ok) return { ok: true, value: attempt.value, repairs: applied };
  }

  return { ok: false, message: attempt.message };
}

// ---------- Coercion ----------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const NUMERIC = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

/**
 * Nudge a parsed value toward `schema` where the intent is unambiguous.
 * Returns a new value; the input is left untouched.
 */
export function coerceToSchema(schema: ZodTypeAny, value: unknown): unknown {
  if (schema instanceof ZodOptional || schema instanceof ZodNullable) {
    return value === undefined || value === null ? value : coerceToSchema(schema.unwrap(), value);
  }
  if (schema instanceof ZodDefault) {
    return value === undefined ? value : coerceToSchema(schema.removeDefault(), value);
  }
  if (schema instanceof ZodEffects) {
    return coerceToSchema(schema.innerType(), value);
  }

  if (schema instanceof ZodArray) {
    const element: ZodTypeAny = schema.element;
    if (Array.isArray(value)) return value.map((item: unknown) => coerceToSchema(element, item));
    if (isPlainObject(value)) {
      const values = Object.values(value);
      const [only] = values;
      if (values.length === 1 && Array.isArray(only)) {
        return only.map((item: unknown) => coerceToSchema(element, item));
      }
      return value;
    }
    if (value === undefined || value === null) return value;
    return [coerceToSchema(element, value)];
  }

  if (schema instanceof ZodObject) {
    if (!isPlainObject(value)) return value;
    const shape: Record<string, ZodTypeAny> = schema.shape;
    const out: Record<string, unknown> = { ...value };
    for (const [key, fieldSchema] of Object.entries(shape)) {
      if (key in value) out[key] = coerceToSchema(fieldSchema, value[key]);
    }
    return out;
  }

  if (schema instanceof ZodString) {
    return typeof value === "number" || typeof value === "boolean" ? String(value) : value;
  }

  if (schema instanceof ZodNumber) {
    return typeof value === "string" && NUMERIC.test(value.trim()) ? Number(value.trim()) : value;
  }

  if (schema instanceof ZodEnum) {
    if (typeof value !== "string") return value;
    const options: readonly string[] = schema.options;
    const wanted = value.trim().toLowerCase();
    return options.find((option) => option.toLowerCase() === wanted) ?? value;
  }

  return value;
}

function formatIssue(issue: ZodIssue): string {
  return `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`;
}

// ---------- Entry points ----------

function recoverCandidate<T>(
  candidate: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): RecoveryResult<T> {
  const parsed = parseWithRepairs(candidate);
  if (!parsed.ok) {
    return { kind: "unparseable", reason: parsed.message };
  }

  const validated = schema.safeParse(coerceToSchema(schema, parsed.value));
  if (!validated.success) {
    return {
      kind: "schema-mismatch",
      issues: validated.error.issues.map(formatIssue),
      value: parsed.value,
    };
  }

  return { kind: "valid", value: validated.data, repairs: parsed.repairs };
}

/**
 * Try the candidates largest first and return the first valid one. When none
 * is valid, the failure of the largest candidate is reported.
 */
export function recover<T>(
  rawText: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): RecoveryResult<T> {
  const fenced = extractCandidates(stripCodeFences(rawText));
  const candidates = fenced.length > 0 ? fenced : extractCandidates(rawText);

  let failure: RecoveryResult<T> | undefined;
  for (const candidate of candidates) {
    const result = recoverCandidate(candidate, schema);
    if (result.kind === "valid") return result;
    failure ??= result;
  }

  return failure ?? { kind: "unparseable", reason: "no JSON object or array found" };
}

export function toRecoveryError(failure: RecoveryFailure, details?: Record<string, unknown>): AppError {
  switch (failure.kind) {
    case "unparseable":
      return new RecoveryUnparseableError(`No parseable JSON in generated text: ${failure.reason}`, {
        details,
      });
    case "schema-mismatch":
      return new RecoverySchemaMismatchError(failure.issues, { details });
  }
}
