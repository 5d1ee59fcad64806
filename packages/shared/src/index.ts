export * from "./config.js";
export * from "./errors/index.js";
export * from "./i18n/index.js";
export * from "./logging.js";
export * from "./lru.js";
export * from "./text.js";
export * from "./time.js";
export * from "./validation.js";
