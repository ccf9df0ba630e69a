export * from "./time.js";
export * from "./runtime/clock.js";
export * from "./logging/index.js";
export * from "./config/properties.js";
export * from "./errors/index.js";
