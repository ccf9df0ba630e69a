export * from "./cli.js";
export * from "./bootstrap/composition-root.js";
