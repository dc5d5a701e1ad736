export type { IChunker } from "./chunker.interface.js";
export { estimateTokens } from "./chunker.interface.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
export { computeChunkId } from "./chunk-id.js";
export { chunkDocument } from "./document-chunker.js";
