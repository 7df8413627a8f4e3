export * from "./types.js";
export * from "./data.js";
export * from "./catalog.js";
export * from "./validate.js";
export * from "./stages.js";
export * from "./render.js";
export * from "./log.js";
export * from "./platform.js";
