export * from "./common.js";
export * from "./bundle.js";
export * from "./config.js";
