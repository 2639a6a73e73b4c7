export * from "./cache.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./export.js";
export * from "./extract.js";
export * from "./logger.js";
export * from "./metadata.js";
export * from "./preview.js";
export * from "./reader.js";
export * from "./scan/anchored.js";
export * from "./scan/balanced.js";
export * from "./scan/common.js";
export * from "./scan/normalize.js";
export * from "./store/memory.js";
export * from "./store/sqlite.js";
export * from "./titles.js";
export type { BlobStore } from "./store/types.js";
export * from "./utils.js";
