export * from "./errors.js";
export * from "./validation.js";
export * from "./bundle-source.js";
export * from "./bundle-loader.js";
export * from "./resource-bundle-message-resolver.js";
export * from "./in-memory-message-resolver.js";
export * from "./message-accessor.js";
export * from "./config.js";
