export * from "./filters.js";
export * from "./templater.js";
export * from "./textdomain.js";
