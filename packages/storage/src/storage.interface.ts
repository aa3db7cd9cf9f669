/**
 * Blob access by `bucket/path` URI.
 */
export interface IStorage {
  read(uri: string): Promise<Uint8Array>;
  /** Returns the URI written to. */
  write(uri: string, bytes: Uint8Array, contentType: string): Promise<string>;
  exists(uri: string): Promise<boolean>;
}

export interface StorageLocation {
  bucket: string;
  path: string;
}
