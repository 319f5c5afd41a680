export * from "./config.js";
export * from "./data.js";
export * from "./result.js";
export * from "./test.js";
