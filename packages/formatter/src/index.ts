export * from "./call-shapes.js";
export * from "./message-formatter.js";
export * from "./modifiers/index.js";
export * from "./placeholder-template.js";
export * from "./resolver.js";
