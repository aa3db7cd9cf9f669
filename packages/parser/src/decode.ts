const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

/**
 * Decode bytes as UTF-8, falling back to Latin-1 when they are not valid UTF-8.
 */
export function decodeText(bytes: Uint8Array): { text: string; encoding: "utf-8" | "latin1" } {
  try {
    return { text: utf8.decode(bytes), encoding: "utf-8" };
  } catch (error: unknown) {
    if (error instanceof TypeError) {
      return { text: latin1.decode(bytes), encoding: "latin1" };
    }
    throw error;
  }
}

/** Lower-cased MIME type without parameters (`Text/HTML; charset=utf-8` -> `text/html`). */
export function normalizeMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}
