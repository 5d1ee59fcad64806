export * from "./catalog.js";
export * from "./in-memory-catalog-store.js";
export * from "./scanner.js";
