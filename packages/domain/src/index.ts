export * from "./locale.js";
export * from "./message-bundle.js";
export * from "./message-resolver.js";
