export * from "./common.js";
export * from "./options.js";
