import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { NotFoundError } from "@indexflow/errors";
import type { IStorage } from "./storage.interface.js";
import { parseStorageUri } from "./uri.js";

/**
 * Storage rooted at a local directory; `bucket/path` maps to `<root>/bucket/path`.
 */
export class LocalFileStorage implements IStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async read(uri: string): Promise<Uint8Array> {
    const file = this.resolvePath(uri);
    try {
      return new Uint8Array(await readFile(file));
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Object ${uri} not found`, { cause: error });
      }
      throw error;
    }
  }

  async write(uri: string, bytes: Uint8Array, _contentType: string): Promise<string> {
    const file = this.resolvePath(uri);
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, bytes);
    return uri;
  }

  async exists(uri: string): Promise<boolean> {
    try {
      await access(this.resolvePath(uri));
      return true;
    } catch (error: unknown) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  private resolvePath(uri: string): string {
    const { bucket, path } = parseStorageUri(uri);
    return join(this.root, bucket, path);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
