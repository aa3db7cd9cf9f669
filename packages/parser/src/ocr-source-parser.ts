import type { ParseResult } from "@indexflow/types";
import { normalizeMimeType } from "./decode.js";
import type { IParser } from "./parser.interface.js";

const OCR_MIME_TYPES = ["application/pdf", "image/png", "image/jpeg", "image/tiff"] as const;

/**
 * Scanned documents and images carry no extractable native text; the OCR
 * phase supplies it. Returns an empty text body.
 */
export class OcrSourceParser implements IParser {
  readonly supportedMimeTypes = OCR_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    return {
      text: "",
      pageCount: 1,
      metadata: {
        mimeType: normalizeMimeType(mimeType),
        byteSize: typeof input === "string" ? input.length : input.byteLength,
        deferredToOcr: true,
      },
    };
  }
}
