import { createHash } from "node:crypto";
import { getParser } from "./factory.js";

const LINE_BREAKS = /\r\n?/g;
const NBSP = /\u00A0/g;
const ZERO_WIDTH = /[\u200B-\u200D\uFEFF]/g;
const SPACE_RUNS = /[ \t]+/g;
const TRAILING_SPACE = /[ \t]+\n/g;
const BLANK_LINES = /\n{3,}/g;

/**
 * Canonical form used for both chunking and hashing. Pure and deterministic.
 */
export function normalizeText(raw: string): string {
  if (!raw) {
    return "";
  }
  return raw
    .normalize("NFC")
    .replace(LINE_BREAKS, "\n")
    .replace(NBSP, " ")
    .replace(ZERO_WIDTH, "")
    .replace(SPACE_RUNS, " ")
    .replace(TRAILING_SPACE, "\n")
    .replace(BLANK_LINES, "\n\n")
    .trim();
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

export function computeContentHash(raw: string): string {
  return sha256Hex(normalizeText(raw));
}

export type NormalizationResult =
  | { status: "ok"; text: string; contentHash: string }
  | { status: "unsupported"; mimeType: string }
  | { status: "empty" };

/**
 * Convert raw source content into canonical text plus its content hash.
 * Content no parser understands is reported as unsupported, not guessed at.
 */
export async function normalizeContent(
  content: Uint8Array | string,
  mimeType: string,
): Promise<NormalizationResult> {
  const parser = getParser(mimeType);
  if (!parser) {
    return { status: "unsupported", mimeType };
  }

  const parsed = await parser.parse(content, mimeType);
  const text = normalizeText(parsed.text);
  if (text.length === 0) {
    return { status: "empty" };
  }

  return { status: "ok", text, contentHash: sha256Hex(text) };
}
