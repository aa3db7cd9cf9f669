import { createHash } from "node:crypto";
import { UnsupportedMimeTypeError } from "@indexflow/errors";
import { getParser } from "@indexflow/parser";
import type { IStorage } from "@indexflow/storage";
import type { ConvertedText } from "@indexflow/types";
import { runPhase, type PhaseContext } from "./phase-runner.js";

export interface ConvertInput {
  sourceUri: string;
  mimeType: string;
  /** An OCR pass follows, so OCR-only formats are accepted with empty native text. */
  needsOcr?: boolean;
}

export interface ConvertDeps extends PhaseContext {
  storage: IStorage;
}

export function convertedTextUri(jobId: string): string {
  return `rag-cache-jobs/${jobId}/converted.txt`;
}

/**
 * Extracts native text from the source file and caches it as UTF-8.
 */
export async function convertToText(input: ConvertInput, deps: ConvertDeps): Promise<ConvertedText> {
  return runPhase(
    "convert",
    deps,
    async () => {
      const parser = getParser(input.mimeType, { needsOcr: input.needsOcr ?? false });
      if (!parser) {
        throw new UnsupportedMimeTypeError(input.mimeType);
      }

      const source = await deps.storage.read(input.sourceUri);
      const parsed = await parser.parse(source, input.mimeType);
      const bytes = new TextEncoder().encode(parsed.text);
      const resultUri = await deps.storage.write(
        convertedTextUri(deps.jobId),
        bytes,
        "text/plain; charset=utf-8",
      );

      return {
        resultUri,
        byteSize: bytes.byteLength,
        checksum: createHash("sha256").update(parsed.text, "utf8").digest("hex"),
      };
    },
    (result) => ({
      message: `Converted ${input.mimeType} to ${String(result.byteSize)} bytes of text`,
      payload: { ...result, mimeType: input.mimeType },
    }),
  );
}
