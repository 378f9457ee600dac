import { TEXT_BLOCK_TYPES, type DocumentSource, type LayoutBlock } from "@docenrich/types";
import { StageClient, type StageResult } from "./stage-client.js";
import type { HttpStageOptions } from "./language-detection-client.js";
import type { IStructurer, StructuredDocument } from "./stage-clients.interface.js";
import { structuringResponseSchema, type LayoutElement } from "./schemas.js";

const TEXT_TYPES: ReadonlySet<string> = new Set(TEXT_BLOCK_TYPES);

function toBlock(element: LayoutElement): LayoutBlock {
  return {
    type: element.type,
    text: element.text ?? "",
    pageNumber: element.metadata?.page_number ?? null,
  };
}

/**
 * Concatenates the text of narrative, list and title blocks, each followed by a
 * blank line. Blocks of other types (tables, headers, footers, images) stay in
 * `blocks` but do not contribute text.
 */
export function buildStructuredText(blocks: readonly LayoutBlock[]): string {
  let text = "";
  for (const block of blocks) {
    if (TEXT_TYPES.has(block.type) && block.text.trim()) {
      text += `${block.text}\n\n`;
    }
  }
  return text;
}

export class StructuringClient implements IStructurer {
  private readonly client: StageClient;
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: HttpStageOptions) {
    this.client = new StageClient({ ...options, stage: "structuring" });
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  async structure(
    source: DocumentSource,
    signal?: AbortSignal,
  ): Promise<StageResult<StructuredDocument>> {
    const { value, attempts } = await this.client.call(
      this.url,
      { kind: "file", fileName: source.fileName, bytes: source.bytes },
      { timeoutMs: this.timeoutMs, responseSchema: structuringResponseSchema, signal },
    );

    const blocks = value.map(toBlock);
    return { value: { structuredText: buildStructuredText(blocks), blocks }, attempts };
  }
}
