export * from "./jobs.js";
export * from "./job-events.js";
export * from "./chunks.js";
export * from "./embeddings.js";
export * from "./credits.js";
