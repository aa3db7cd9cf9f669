export * from "./job.js";
export * from "./chunk.js";
export * from "./embedding.js";
export * from "./pipeline.js";
export * from "./credits.js";
export * from "./config.js";
export * from "./result.js";
export * from "./job-state.js";
