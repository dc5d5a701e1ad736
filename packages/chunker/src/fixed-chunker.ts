import type { ChunkBudget, TextSpan } from "@indexloom/types";
import { estimateTokens } from "./chunker.interface.js";
import type { IChunker } from "./chunker.interface.js";

/**
 * Fixed character windows of `maxTokensPerChunk * 4` characters, no overlap.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, budget: ChunkBudget): TextSpan[] {
    const charsPerChunk = budget.maxTokensPerChunk * 4;
    if (charsPerChunk < 4) {
      throw new RangeError("maxTokensPerChunk must be at least 1");
    }

    const results: TextSpan[] = [];
    for (let startChar = 0; startChar < content.length; startChar += charsPerChunk) {
      const window = content.slice(startChar, startChar + charsPerChunk);
      const chunk = window.trim();
      if (chunk.length === 0) continue;

      const offset = startChar + window.indexOf(chunk);
      results.push({
        content: chunk,
        index: results.length,
        tokenCount: estimateTokens(chunk),
        startChar: offset,
        endChar: offset + chunk.length,
      });
    }

    return results;
  }
}
