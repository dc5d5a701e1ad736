import type { ChunkBudget, ChunkStrategy, TextSpan } from "@indexloom/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  /** Split normalized text into spans of at most `budget.maxTokensPerChunk` estimated tokens. */
  chunk(content: string, budget: ChunkBudget): TextSpan[];
}

/** ~4 characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
