import type { EmbeddingResult } from "@indexloom/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a single search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed document texts; returns exactly one vector per text, in order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
