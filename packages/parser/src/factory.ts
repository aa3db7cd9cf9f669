import { normalizeMimeType } from "./decode.js";
import { OcrSourceParser } from "./ocr-source-parser.js";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";

const textParser = new TextParser();
const ocrSourceParser = new OcrSourceParser();

export interface ParserLookupOptions {
  /** Accept OCR-only formats (PDF, images) because an OCR pass will follow. */
  needsOcr?: boolean;
}

/**
 * Select the parser for a MIME type, or undefined when the type has no native
 * text extraction.
 */
export function getParser(mimeType: string, options?: ParserLookupOptions): IParser | undefined {
  const type = normalizeMimeType(mimeType);
  if (textParser.supportedMimeTypes.some((t) => t === type)) {
    return textParser;
  }
  if (options?.needsOcr && isOcrCapable(type)) {
    return ocrSourceParser;
  }
  return undefined;
}

export function isOcrCapable(mimeType: string): boolean {
  const type = normalizeMimeType(mimeType);
  return ocrSourceParser.supportedMimeTypes.some((t) => t === type);
}
