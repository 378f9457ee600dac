/** A contiguous slice of the source text. `end` is exclusive. */
export interface TextWindow {
  index: number;
  text: string;
  start: number;
  end: number;
}

export interface ITextSplitter {
  readonly maxChars: number;
  split(content: string): TextWindow[];
}
