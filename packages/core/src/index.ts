export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./chunking.js";
export * from "./embedding.js";
export * from "./vector-index.js";
export * from "./corpus.js";
export * from "./lancedb.js";
export * from "./index-store.js";
export * from "./search-common.js";
export * from "./lexical.js";
export * from "./search.js";
export * from "./guides.js";
export * from "./result-cache.js";
export * from "./context.js";
