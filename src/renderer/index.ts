export * from "./helm.js";
export * from "./parse.js";
export * from "./types.js";
