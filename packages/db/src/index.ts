export * from "./schema/index.js";
export {
  createWorkerDbClient,
  isUniqueViolation,
  type Database,
  type DbClient,
  type DbClientOptions,
} from "./client.js";
export * from "./stores/index.js";
