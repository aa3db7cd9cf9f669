export type { IStorage, StorageLocation } from "./storage.interface.js";
export { parseStorageUri, isStorageUri } from "./uri.js";
export { LocalFileStorage } from "./local-storage.js";
export { MemoryStorage } from "./memory-storage.js";
