import { NotFoundError } from "@indexflow/errors";
import type { IStorage } from "./storage.interface.js";
import { parseStorageUri } from "./uri.js";

interface StoredObject {
  bytes: Uint8Array;
  contentType: string;
}

export class MemoryStorage implements IStorage {
  private readonly objects = new Map<string, StoredObject>();

  async read(uri: string): Promise<Uint8Array> {
    parseStorageUri(uri);
    const object = this.objects.get(uri);
    if (!object) {
      throw new NotFoundError(`Object ${uri} not found`);
    }
    return object.bytes.slice();
  }

  async write(uri: string, bytes: Uint8Array, contentType: string): Promise<string> {
    parseStorageUri(uri);
    this.objects.set(uri, { bytes: bytes.slice(), contentType });
    return uri;
  }

  async exists(uri: string): Promise<boolean> {
    parseStorageUri(uri);
    return this.objects.has(uri);
  }

  contentType(uri: string): string | undefined {
    return this.objects.get(uri)?.contentType;
  }

  /** Convenience for tests and seeding. */
  async putText(uri: string, text: string, contentType = "text/plain"): Promise<string> {
    return this.write(uri, new TextEncoder().encode(text), contentType);
  }
}
