export { LocalDirectorySource } from "./local-directory-source.js";
export type { LocalDirectorySourceOptions } from "./local-directory-source.js";
export { InMemoryContentSource } from "./in-memory-source.js";
export type { InMemoryDocument } from "./in-memory-source.js";
export { SourceRegistry } from "./registry.js";
export { mimeTypeFor } from "./mime.js";
