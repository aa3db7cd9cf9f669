import type { ParseResult } from "@indexflow/types";
import { decodeText, normalizeMimeType } from "./decode.js";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
  "text/xml",
] as const;

/**
 * Plain text, markdown and other text-based formats.
 * HTML is reduced to its visible text; everything else is passed through.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const decoded =
      typeof input === "string" ? { text: input, encoding: "utf-8" as const } : decodeText(input);
    const type = normalizeMimeType(mimeType);

    const cleanedText = type === "text/html" ? this.stripHtml(decoded.text) : decoded.text;

    // Estimate page count (roughly 3000 chars per page)
    const pageCount = Math.max(1, Math.ceil(cleanedText.length / 3000));

    return {
      text: cleanedText,
      pageCount,
      metadata: {
        mimeType: type,
        encoding: decoded.encoding,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/&nbsp;/g, " ")
      .replace(/&lt;/g, "<")
      .replace(/&gt;/g, ">")
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/&amp;/g, "&")
      .replace(/\s+/g, " ")
      .trim();
  }
}
