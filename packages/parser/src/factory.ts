import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";

const allParsers: IParser[] = [new TextParser()];

/**
 * Select the parser for a mimeType, or null when no parser can read it.
 */
export function getParser(mimeType: string): IParser | null {
  return allParsers.find((p) => p.supports(mimeType)) ?? null;
}
