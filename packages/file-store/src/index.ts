export * from "./errors.js";
export * from "./file-store.js";
export * from "./handles.js";
export * from "./in-memory-file-store.js";
export * from "./local-file-store.js";
