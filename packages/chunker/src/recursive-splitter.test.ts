import { describe, it, expect } from "vitest";
import { RecursiveTextSplitter } from "./recursive-splitter.js";

const SAMPLE_TEXT = "Alpha beta gamma.\n\nDelta epsilon zeta.\n\nEta theta iota kappa.";

describe("RecursiveTextSplitter", () => {
  it("returns short text as a single window", () => {
    const windows = new RecursiveTextSplitter(100).split("  Short text \n");

    expect(windows).toEqual([{ index: 0, text: "Short text", start: 2, end: 12 }]);
  });

  it("splits at paragraph boundaries first", () => {
    const windows = new RecursiveTextSplitter(30).split(SAMPLE_TEXT);

    expect(windows).toEqual([
      { index: 0, text: "Alpha beta gamma.", start: 0, end: 17 },
      { index: 1, text: "Delta epsilon zeta.", start: 19, end: 38 },
      { index: 2, text: "Eta theta iota kappa.", start: 40, end: 61 },
    ]);
  });

  it("packs consecutive paragraphs into one window while they fit", () => {
    const windows = new RecursiveTextSplitter(45).split(SAMPLE_TEXT);

    expect(windows.map((w) => w.text)).toEqual([
      "Alpha beta gamma.\n\nDelta epsilon zeta.",
      "Eta theta iota kappa.",
    ]);
  });

  it("falls back to sentence boundaries", () => {
    const windows = new RecursiveTextSplitter(15).split("One two three. Four five six. Seven.");

    expect(windows.map((w) => w.text)).toEqual(["One two three.", "Four five six.", "Seven."]);
  });

  it("hard-cuts text without separators", () => {
    const windows = new RecursiveTextSplitter(4).split("abcdefghij");

    expect(windows.map((w) => w.text)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("produces ordered, non-overlapping verbatim windows within the limit", () => {
    let content = "";
    for (let i = 0; i < 40; i++) {
      content += `Sentence number ${String(i)} is here.${i % 5 === 4 ? "\n\n" : " "}`;
    }
    const splitter = new RecursiveTextSplitter(120);

    const windows = splitter.split(content);

    let previousEnd = 0;
    for (const window of windows) {
      expect(window.text.length).toBeLessThanOrEqual(120);
      expect(content.slice(window.start, window.end)).toBe(window.text);
      expect(window.start).toBeGreaterThanOrEqual(previousEnd);
      previousEnd = window.end;
    }
  });

  it("returns no windows for blank input", () => {
    expect(new RecursiveTextSplitter(10).split(" \n\n ")).toEqual([]);
  });

  it("rejects a non-positive window size", () => {
    expect(() => new RecursiveTextSplitter(0)).toThrow(RangeError);
  });
});
