import { describe, it, expect } from "vitest";
import { RecoverySchemaMismatchError, RecoveryUnparseableError } from "@docenrich/errors";
import {
  coerceToSchema,
  extractCandidate,
  extractCandidates,
  recover,
  stripCodeFences,
  toRecoveryError,
} from "./json-recovery.js";
import {
  keySentencesMetadataSchema,
  questionsSchema,
  semanticChunkingSchema,
  summaryKeywordsSchema,
} from "./schemas.js";

const VALID = '{"summary":"Revenue grew in 2023.","keywords":["revenue","growth","2023"]}';

describe("recover", () => {
  it("returns exactly what direct parsing gives for valid JSON", () => {
    const result = recover(VALID, summaryKeywordsSchema);

    expect(result).toEqual({ kind: "valid", value: JSON.parse(VALID), repairs: [] });
  });

  it("keeps surrounding whitespace in valid strings", () => {
    const raw = '{"summary":"Revenue grew. ","keywords":[" revenue","growth","2023"]}';

    expect(recover(raw, summaryKeywordsSchema)).toEqual({
      kind: "valid",
      value: JSON.parse(raw),
      repairs: [],
    });
  });

  it("rejects blank strings", () => {
    const result = recover('["Why?", "   "]', questionsSchema);

    expect(result.kind).toBe("schema-mismatch");
    expect(result.kind === "schema-mismatch" ? result.issues : []).toEqual(["1: must not be blank"]);
  });

  it("drops repeated keywords case-insensitively, keeping the first spelling", () => {
    const raw = '{"summary":"Revenue grew.","keywords":["Revenue","growth","revenue","2023"," GROWTH"]}';

    const result = recover(raw, summaryKeywordsSchema);

    expect(result.kind === "valid" ? result.value.keywords : null).toEqual([
      "Revenue",
      "growth",
      "2023",
    ]);
  });

  it("counts only distinct keywords", () => {
    const raw = '{"summary":"Revenue grew.","keywords":["revenue","Revenue","revenue"]}';

    const result = recover(raw, summaryKeywordsSchema);

    expect(result.kind).toBe("schema-mismatch");
    expect(result.kind === "schema-mismatch" ? result.issues : []).toEqual([
      "keywords: must hold 3 to 5 distinct entries",
    ]);
  });

  it("counts only distinct questions", () => {
    const result = recover('["Why?", "Why?"]', questionsSchema);

    expect(result).toEqual({
      kind: "schema-mismatch",
      issues: ["(root): must hold 2 to 3 distinct entries"],
      value: ["Why?", "Why?"],
    });
  });

  it("finds a balanced object after an opener that never closes", () => {
    const raw = `Here [the answer: ${VALID}`;

    expect(recover(raw, summaryKeywordsSchema)).toEqual({
      kind: "valid",
      value: JSON.parse(VALID),
      repairs: [],
    });
  });

  it("extracts JSON wrapped in prose and a code fence", () => {
    const raw = `Sure! Here is the result:\n\`\`\`json\n${VALID}\n\`\`\`\nLet me know if you need more.`;

    const result = recover(raw, summaryKeywordsSchema);

    expect(result.kind).toBe("valid");
    expect(result.kind === "valid" ? result.value.keywords : []).toEqual([
      "revenue",
      "growth",
      "2023",
    ]);
  });

  it("reports a string cut off mid-value as unparseable", () => {
    expect(recover('{"summary": "abc', summaryKeywordsSchema).kind).toBe("unparseable");
  });

  it("reports text without any JSON as unparseable", () => {
    expect(recover("I cannot help with that.", questionsSchema)).toEqual({
      kind: "unparseable",
      reason: "no JSON object or array found",
    });
  });

  it("drops the truncated last element of an array", () => {
    const result = recover('["First chunk.", "Second chunk.", "Third ch', semanticChunkingSchema);

    expect(result).toEqual({
      kind: "valid",
      value: ["First chunk.", "Second chunk."],
      repairs: ["truncated-array", "balance-brackets"],
    });
  });

  it("converts single quotes and removes trailing commas", () => {
    const raw = "{'summary': 'A short summary.', 'keywords': ['x', 'y', 'z',],}";

    const result = recover(raw, summaryKeywordsSchema);

    expect(result).toEqual({
      kind: "valid",
      value: { summary: "A short summary.", keywords: ["x", "y", "z"] },
      repairs: ["single-quotes", "trailing-commas"],
    });
  });

  it("escapes unescaped quotes inside strings", () => {
    const raw = '{"summary": "The "new" plan works.", "keywords": ["plan", "new", "work"]}';

    const result = recover(raw, summaryKeywordsSchema);

    expect(result.kind === "valid" ? result.value.summary : null).toBe('The "new" plan works.');
  });

  it("escapes raw line breaks inside strings", () => {
    const raw = '{"summary": "Line one\nLine two.", "keywords": ["a", "b", "c"]}';

    const result = recover(raw, summaryKeywordsSchema);

    expect(result.kind === "valid" ? result.value.summary : null).toBe("Line one\nLine two.");
  });

  it("inserts missing commas between values", () => {
    const result = recover('["What is X?"\n"Why Y?"]', questionsSchema);

    expect(result).toEqual({
      kind: "valid",
      value: ["What is X?", "Why Y?"],
      repairs: ["missing-commas"],
    });
  });

  it("normalizes smart quotes", () => {
    const result = recover("[“Is it done?”, “When?”]", questionsSchema);

    expect(result.kind === "valid" ? result.value : null).toEqual(["Is it done?", "When?"]);
  });

  it("coerces toward the schema before validating", () => {
    const raw = JSON.stringify({
      key_sentences: "Only one.",
      metadata: {
        main_topic: 42,
        sentiment: "Positive",
        named_entities: { items: [{ name: "ACME", type: "ORG" }] },
      },
    });

    const result = recover(raw, keySentencesMetadataSchema);

    expect(result).toEqual({
      kind: "valid",
      value: {
        key_sentences: ["Only one."],
        metadata: {
          main_topic: "42",
          sentiment: "positive",
          named_entities: [{ name: "ACME", type: "ORG" }],
        },
      },
      repairs: [],
    });
  });

  it("reports a schema mismatch with the zod issues", () => {
    const result = recover('{"summary": "Short.", "keywords": ["a", "b"]}', summaryKeywordsSchema);

    expect(result.kind).toBe("schema-mismatch");
    expect(result.kind === "schema-mismatch" ? result.issues : []).toEqual([
      "keywords: must hold 3 to 5 distinct entries",
    ]);
  });

  it("rejects a summary longer than three sentences", () => {
    const raw = JSON.stringify({
      summary: "One. Two. Three. Four.",
      keywords: ["a", "b", "c"],
    });

    expect(recover(raw, summaryKeywordsSchema).kind).toBe("schema-mismatch");
  });
});

describe("extractCandidate", () => {
  it("takes the largest balanced candidate", () => {
    expect(extractCandidate('See [1]: {"a": [1, 2]} and {"b": 1}')).toBe('{"a": [1, 2]}');
  });

  it("ignores brackets inside strings", () => {
    expect(extractCandidate('{"a": "}"} trailing')).toBe('{"a": "}"}');
  });

  it("takes the remainder when the opener never closes", () => {
    expect(extractCandidate('Result: {"a": [1, 2')).toBe('{"a": [1, 2');
  });
});

describe("extractCandidates", () => {
  it("keeps looking after an opener that never closes, largest first", () => {
    expect(extractCandidates('Note [see: {"a": 1} end')).toEqual([
      '[see: {"a": 1} end',
      '{"a": 1}',
    ]);
  });
});

describe("stripCodeFences", () => {
  it("returns the content of the first fenced block", () => {
    expect(stripCodeFences("```json\n[1]\n```")).toBe("[1]\n");
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFences("[1]")).toBe("[1]");
  });
});

describe("coerceToSchema", () => {
  it("does not mutate its input", () => {
    const input = { key_sentences: "One.", metadata: { main_topic: 1 } };
    const snapshot = structuredClone(input);

    coerceToSchema(keySentencesMetadataSchema, input);

    expect(input).toEqual(snapshot);
  });
});

describe("toRecoveryError", () => {
  it("maps failures onto the recovery error classes", () => {
    const unparseable = toRecoveryError({ kind: "unparseable", reason: "Unexpected end" });
    const mismatch = toRecoveryError({ kind: "schema-mismatch", issues: ["x: Required"], value: {} });

    expect(unparseable).toBeInstanceOf(RecoveryUnparseableError);
    expect(unparseable.message).toBe("No parseable JSON in generated text: Unexpected end");
    expect(mismatch).toBeInstanceOf(RecoverySchemaMismatchError);
    expect(mismatch.code).toBe("RECOVERY_SCHEMA_MISMATCH");
  });
});
