import { createHash } from "node:crypto";

/**
 * Deterministic, UUID-shaped chunk id. The generation (the document's content
 * hash) is part of the key, so a new revision never overwrites the points of
 * the live one while it is being written.
 */
export function computeChunkId(args: {
  userId: string;
  sourceId: string;
  generation: string;
  sequenceIndex: number;
}): string {
  const hex = createHash("sha256")
    .update(
      [
        `user:${args.userId}`,
        `source:${args.sourceId}`,
        `generation:${args.generation}`,
        `index:${String(args.sequenceIndex)}`,
      ].join("\n"),
    )
    .digest("hex");

  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}
