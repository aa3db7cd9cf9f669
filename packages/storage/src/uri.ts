import { ValidationError } from "@indexflow/errors";
import type { StorageLocation } from "./storage.interface.js";

const BUCKET_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i;

/**
 * Split and validate a `bucket/path` URI. Absolute paths, empty segments,
 * `.` and `..` segments are rejected.
 */
export function parseStorageUri(uri: string): StorageLocation {
  if (uri.startsWith("/") || uri.includes("\\")) {
    throw invalid(uri, "must be a relative bucket/path");
  }
  const segments = uri.split("/");
  const [bucket, ...rest] = segments;
  if (!bucket || !BUCKET_PATTERN.test(bucket)) {
    throw invalid(uri, "bucket name is invalid");
  }
  if (rest.length === 0) {
    throw invalid(uri, "path is missing");
  }
  if (rest.some((s) => s === "" || s === "." || s === "..")) {
    throw invalid(uri, "path contains empty or relative segments");
  }
  return { bucket, path: rest.join("/") };
}

export function isStorageUri(uri: string): boolean {
  try {
    parseStorageUri(uri);
    return true;
  } catch {
    return false;
  }
}

function invalid(uri: string, reason: string): ValidationError {
  return new ValidationError(`Invalid storage URI "${uri}": ${reason}`, { uri: reason });
}
