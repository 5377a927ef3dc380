export * from "./types.js";
export * from "./retry.js";
export * from "./aws.js";
export * from "./file.js";
export * from "./fallback.js";
export * from "./multi.js";
