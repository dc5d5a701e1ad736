import type { ChunkBudget, TextSpan } from "@indexloom/types";
import { estimateTokens } from "./chunker.interface.js";
import type { IChunker } from "./chunker.interface.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " "];
const HEADING = /^#{1,6}[ \t]+(.+)$/gm;
const FENCE = /^```/gm;

interface Section {
  title?: string;
  text: string;
  start: number;
}

/**
 * Structural splitting: markdown heading sections first, then the separator
 * hierarchy (paragraphs, lines, sentences, words), then a hard character cut.
 * Neighbouring pieces are packed greedily up to the budget. Identical input
 * always yields identical spans.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, budget: ChunkBudget): TextSpan[] {
    const maxTokens = budget.maxTokensPerChunk;
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new RangeError(`maxTokensPerChunk must be a positive integer, got ${String(maxTokens)}`);
    }

    const spans: TextSpan[] = [];
    for (const section of splitSections(content)) {
      let cursor = 0;
      for (const piece of this.splitRecursive(section.text, maxTokens, 0)) {
        const found = section.text.indexOf(piece, cursor);
        const local = found >= 0 ? found : cursor;
        const startChar = section.start + local;
        spans.push({
          content: piece,
          index: spans.length,
          tokenCount: estimateTokens(piece),
          startChar,
          endChar: startChar + piece.length,
          ...(section.title !== undefined ? { sectionTitle: section.title } : {}),
        });
        cursor = local + piece.length;
      }
    }
    return spans;
  }

  private splitRecursive(text: string, maxTokens: number, separatorIndex: number): string[] {
    if (estimateTokens(text) <= maxTokens) {
      return text.trim().length > 0 ? [text.trim()] : [];
    }

    const separator = this.separators[separatorIndex];
    if (separator === undefined || separator === "") {
      return hardSplit(text, maxTokens);
    }

    const rawParts = text.split(separator);
    const parts = separatorIndex === 0 ? mergeFencedParts(rawParts, separator) : rawParts;

    const results: string[] = [];
    let current = "";

    const emit = (piece: string): void => {
      const trimmed = piece.trim();
      if (trimmed.length === 0) return;
      if (estimateTokens(trimmed) <= maxTokens) {
        results.push(trimmed);
      } else {
        results.push(...this.splitRecursive(trimmed, maxTokens, separatorIndex + 1));
      }
    };

    for (const part of parts) {
      const candidate = current.length > 0 ? current + separator + part : part;
      if (estimateTokens(candidate) > maxTokens) {
        emit(current);
        current = part;
      } else {
        current = candidate;
      }
    }
    emit(current);

    return results;
  }
}

function splitSections(content: string): Section[] {
  const fences = [...content.matchAll(FENCE)].map((match) => match.index ?? 0);
  const headings = [...content.matchAll(HEADING)].filter(
    (match) => !insideFence(match.index ?? 0, fences),
  );
  if (headings.length === 0) {
    return [{ text: content, start: 0 }];
  }

  const sections: Section[] = [];
  const firstStart = headings[0]?.index ?? 0;
  if (content.slice(0, firstStart).trim().length > 0) {
    sections.push({ text: content.slice(0, firstStart), start: 0 });
  }

  headings.forEach((match, i) => {
    const start = match.index ?? 0;
    const end = headings[i + 1]?.index ?? content.length;
    sections.push({ title: (match[1] ?? "").trim(), text: content.slice(start, end), start });
  });

  return sections;
}

/** A `#` line after an odd number of fences is code, not a heading. */
function insideFence(offset: number, fences: number[]): boolean {
  return fences.filter((fence) => fence < offset).length % 2 === 1;
}

/**
 * Re-join paragraphs that fall inside an open ``` fence so code blocks
 * survive the paragraph split.
 */
function mergeFencedParts(parts: string[], separator: string): string[] {
  const merged: string[] = [];
  let open: string | null = null;

  for (const part of parts) {
    const fences = (part.match(FENCE) ?? []).length;
    if (open !== null) {
      open = open + separator + part;
      if (fences % 2 === 1) {
        merged.push(open);
        open = null;
      }
    } else if (fences % 2 === 1) {
      open = part;
    } else {
      merged.push(part);
    }
  }
  if (open !== null) {
    merged.push(open);
  }
  return merged;
}

function hardSplit(text: string, maxTokens: number): string[] {
  const maxChars = maxTokens * 4;
  const results: string[] = [];
  for (let i = 0; i < text.length; i += maxChars) {
    const piece = text.slice(i, i + maxChars).trim();
    if (piece.length > 0) {
      results.push(piece);
    }
  }
  return results;
}
