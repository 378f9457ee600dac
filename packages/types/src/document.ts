/** Layout element types whose text is part of the document's structured text. */
export const TEXT_BLOCK_TYPES = ["NarrativeText", "UncategorizedText", "ListItem", "Title"] as const;

export interface LayoutBlock {
  type: string;
  text: string;
  pageNumber: number | null;
}

export interface AnnotatedEntity {
  text: string;
  label: string;
}

export interface DocumentAnnotation {
  language: string;
  entities: AnnotatedEntity[];
  lemmaCount: number;
}

export interface DocumentSource {
  path: string;
  fileName: string;
  bytes: Uint8Array;
}

/**
 * One ingested PDF. Built up stage by stage by the orchestrator and frozen once
 * structuring completes; annotation is attached alongside, never written back
 * into the text or blocks.
 */
export interface Document {
  id: string;
  sourcePath: string;
  language: string;
  structuredText: string;
  blocks: readonly LayoutBlock[];
}
