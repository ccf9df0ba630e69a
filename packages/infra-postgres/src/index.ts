export * from "./pool.js";
export * from "./bundle-source.js";
