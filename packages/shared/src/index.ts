export * from "./types/events.js";
export * from "./types/pipeline.js";
export * from "./types/health.js";
