import type { VectorRecordPayload } from "@indexloom/types";

function str(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  return typeof value === "string" ? value : "";
}

function nullableStr(raw: Record<string, unknown>, key: string): string | null {
  const value = raw[key];
  return typeof value === "string" ? value : null;
}

/** Read a stored payload back into its typed shape. */
export function toPayload(raw: Record<string, unknown> | null | undefined): VectorRecordPayload {
  const source = raw ?? {};
  const sequenceIndex = source["sequenceIndex"];
  return {
    namespace: str(source, "namespace"),
    sourceId: str(source, "sourceId"),
    chunkId: str(source, "chunkId"),
    sequenceIndex: typeof sequenceIndex === "number" ? sequenceIndex : 0,
    generation: str(source, "generation"),
    title: str(source, "title"),
    locator: nullableStr(source, "locator"),
    content: str(source, "content"),
  };
}
