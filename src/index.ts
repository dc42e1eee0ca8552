export * from "./core/index.js";
export * from "./overlay/index.js";
export * from "./navigator/index.js";
