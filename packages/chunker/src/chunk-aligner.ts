/** A chunk located in its source: `text` is `source.slice(start, end)`. */
export interface AlignedChunk {
  text: string;
  start: number;
  end: number;
}

export interface AlignmentResult {
  chunks: AlignedChunk[];
  /** Candidate strings that do not occur in the source. */
  dropped: string[];
}

interface CollapsedText {
  text: string;
  /** offsets[i] is the source index of collapsed character i. */
  offsets: number[];
}

/** Collapse whitespace runs to one space and trim, remembering source positions. */
function collapse(source: string): CollapsedText {
  let text = "";
  const offsets: number[] = [];
  let pendingSpace = -1;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (/\s/.test(ch)) {
      if (pendingSpace === -1 && text.length > 0) pendingSpace = i;
      continue;
    }
    if (pendingSpace !== -1) {
      text += " ";
      offsets.push(pendingSpace);
      pendingSpace = -1;
    }
    text += ch;
    offsets.push(i);
  }

  return { text, offsets };
}

/**
 * Map chunk strings produced by a model back onto the source text. Matching
 * ignores differences in whitespace; the returned text is always the original
 * slice. Candidates are searched in order, starting after the previous match.
 */
export function alignChunks(source: string, candidates: readonly string[]): AlignmentResult {
  const haystack = collapse(source);
  const chunks: AlignedChunk[] = [];
  const dropped: string[] = [];
  let cursor = 0;

  for (const candidate of candidates) {
    const needle = collapse(candidate.normalize("NFC")).text;
    if (needle.length === 0) continue;

    let at = haystack.text.indexOf(needle, cursor);
    if (at === -1) at = haystack.text.indexOf(needle);
    const first = haystack.offsets[at];
    const last = haystack.offsets[at + needle.length - 1];
    if (at === -1 || first === undefined || last === undefined) {
      dropped.push(candidate);
      continue;
    }

    chunks.push({ text: source.slice(first, last + 1), start: first, end: last + 1 });
    cursor = at + needle.length;
  }

  return { chunks, dropped };
}
