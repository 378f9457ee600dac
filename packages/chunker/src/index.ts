export type { ITextSplitter, TextWindow } from "./splitter.interface.js";
export { RecursiveTextSplitter } from "./recursive-splitter.js";
export { alignChunks } from "./chunk-aligner.js";
export type { AlignedChunk, AlignmentResult } from "./chunk-aligner.js";
