import type { ITextSplitter, TextWindow } from "./splitter.interface.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " ", ""];

interface Span {
  start: number;
  end: number;
}

/**
 * Recursive splitting with separator hierarchy.
 * Tries larger separators first, falling back to smaller ones and finally to a
 * hard cut. Windows never overlap and are verbatim slices of the input, trimmed
 * of surrounding whitespace.
 */
export class RecursiveTextSplitter implements ITextSplitter {
  readonly maxChars: number;
  private readonly separators: string[];

  constructor(maxChars: number, separators?: string[]) {
    if (!Number.isInteger(maxChars) || maxChars < 1) {
      throw new RangeError(`maxChars must be a positive integer, got ${String(maxChars)}`);
    }
    this.maxChars = maxChars;
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  split(content: string): TextWindow[] {
    return this.splitRecursive(content, { start: 0, end: content.length }, 0).map(
      (span, index) => ({
        index,
        text: content.slice(span.start, span.end),
        start: span.start,
        end: span.end,
      }),
    );
  }

  private splitRecursive(content: string, range: Span, separatorIndex: number): Span[] {
    const trimmed = trimSpan(content, range);
    if (trimmed === null) return [];
    if (trimmed.end - trimmed.start <= this.maxChars) return [trimmed];

    const separator = this.separators[separatorIndex];
    if (separator === undefined || separator === "") {
      return this.hardCut(content, trimmed);
    }

    const results: Span[] = [];
    let current: Span | null = null;

    const flush = (span: Span): void => {
      const piece = trimSpan(content, span);
      if (piece === null) return;
      if (piece.end - piece.start <= this.maxChars) {
        results.push(piece);
      } else {
        results.push(...this.splitRecursive(content, piece, separatorIndex + 1));
      }
    };

    for (const part of pieces(content, trimmed, separator)) {
      if (current === null) {
        current = part;
      } else if (part.end - current.start > this.maxChars) {
        flush(current);
        current = part;
      } else {
        current = { start: current.start, end: part.end };
      }
    }
    if (current !== null) flush(current);

    return results;
  }

  private hardCut(content: string, range: Span): Span[] {
    const results: Span[] = [];
    for (let i = range.start; i < range.end; i += this.maxChars) {
      const piece = trimSpan(content, { start: i, end: Math.min(range.end, i + this.maxChars) });
      if (piece !== null) results.push(piece);
    }
    return results;
  }
}

/** Split a range at every separator, keeping the separator with the preceding piece. */
function pieces(content: string, range: Span, separator: string): Span[] {
  const result: Span[] = [];
  let start = range.start;
  for (;;) {
    const at = content.indexOf(separator, start);
    if (at === -1 || at + separator.length > range.end) break;
    result.push({ start, end: at + separator.length });
    start = at + separator.length;
  }
  if (start < range.end) result.push({ start, end: range.end });
  return result;
}

function trimSpan(content: string, span: Span): Span | null {
  let { start, end } = span;
  while (start < end && /\s/.test(content.charAt(start))) start++;
  while (end > start && /\s/.test(content.charAt(end - 1))) end--;
  return start < end ? { start, end } : null;
}
