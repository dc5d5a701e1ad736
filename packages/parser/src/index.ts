export type { IParser } from "./parser.interface.js";
export { TextParser, baseMimeType } from "./text-parser.js";
export { getParser } from "./factory.js";
export { normalizeText, normalizeContent, computeContentHash, sha256Hex } from "./normalizer.js";
export type { NormalizationResult } from "./normalizer.js";
