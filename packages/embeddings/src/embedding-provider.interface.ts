import type { EmbeddingInputType, EmbeddingResult } from "@docenrich/types";

export interface EmbedOptions {
  /** Providers that embed queries differently from documents use this. Default: "document". */
  inputType?: EmbeddingInputType;
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
}
