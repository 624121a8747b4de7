export * from "./paths.js";
export * from "./native-providers.js";
export * from "./presets.js";
