import type { OcrResult, OcrStrategy } from "@indexflow/types";

/**
 * Optical character recognition over a stored document.
 */
export interface IOcrProvider {
  readonly name: string;
  analyzeDocument(fileUri: string, strategy: OcrStrategy): Promise<OcrResult>;
}
