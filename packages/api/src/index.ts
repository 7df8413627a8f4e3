export * from "./types.js";
export * from "./errors.js";
export * from "./client.js";
export * from "./payloads.js";
export * from "./apply.js";
export * from "./drift.js";
export * from "./tunables.js";
export * from "./snapshots.js";
export * from "./bootstrap.js";
export * from "./status.js";
