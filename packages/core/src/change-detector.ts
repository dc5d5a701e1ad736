import type { ChangeDecision, ChangeSignal, ContentIndexEntry } from "@indexloom/types";

export interface ChangeOptions {
  /** Re-embed regardless of what is stored. */
  force: boolean;
}

/**
 * Decide whether a document needs re-ingesting. The content hash is
 * authoritative; the source's version marker is only consulted when no hash
 * is available yet (before the content has been fetched).
 */
export function decide(
  entry: ContentIndexEntry | null,
  signal: ChangeSignal,
  options: ChangeOptions,
): ChangeDecision {
  if (options.force || entry === null) {
    return "reingest";
  }
  if (signal.contentHash !== undefined) {
    return signal.contentHash === entry.contentHash ? "skip" : "reingest";
  }
  if (signal.version !== undefined && signal.version !== null && entry.version !== null) {
    return signal.version === entry.version ? "skip" : "reingest";
  }
  return "reingest";
}
