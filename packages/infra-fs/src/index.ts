export * from "./bundle-paths.js";
export * from "./parse-bundle.js";
export * from "./file-system-bundle-source.js";
