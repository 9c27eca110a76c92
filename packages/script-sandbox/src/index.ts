export * from "./capabilities.js";
export * from "./errors.js";
export * from "./generator.js";
export * from "./openai-text-generator.js";
export * from "./sandbox.js";
export * from "./sanitizer.js";
export * from "./spreadsheet-script.js";
