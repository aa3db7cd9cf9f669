import type { IOcrProvider } from "@indexflow/ocr";
import type { IStorage } from "@indexflow/storage";
import type { OcrStrategy, OcrText } from "@indexflow/types";
import { runPhase, type PhaseContext } from "./phase-runner.js";

export interface OcrInput {
  sourceUri: string;
  strategy: OcrStrategy;
}

export interface OcrDeps extends PhaseContext {
  storage: IStorage;
  ocr: IOcrProvider;
}

export function ocrTextUri(jobId: string): string {
  return `rag-cache-pages/${jobId}/ocr_result.txt`;
}

/**
 * Runs the OCR provider over the source file and caches the recognized text.
 * Language and confidence are reported as observed, never checked.
 */
export async function runOcr(input: OcrInput, deps: OcrDeps): Promise<OcrText> {
  const { text } = await runPhase(
    "ocr",
    deps,
    async () => {
      const result = await deps.ocr.analyzeDocument(input.sourceUri, input.strategy);
      const resultUri = await deps.storage.write(
        ocrTextUri(deps.jobId),
        new TextEncoder().encode(result.text),
        "text/plain; charset=utf-8",
      );
      const ocrText: OcrText = {
        resultUri,
        totalPages: result.pages.length,
        lang: result.lang,
        confidence: result.confidence,
      };
      return { text: ocrText, modelUsed: result.modelUsed };
    },
    ({ text, modelUsed }) => ({
      message: `OCR extracted ${String(text.totalPages)} pages with ${modelUsed}`,
      payload: { ...text, modelUsed, strategy: input.strategy },
    }),
  );
  return text;
}
