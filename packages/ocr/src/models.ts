import { assertNever, type OcrStrategy } from "@indexflow/types";

export const PREBUILT_READ = "prebuilt-read";
export const PREBUILT_LAYOUT = "prebuilt-layout";

/** Document Intelligence model used for each OCR strategy. */
export function modelForStrategy(strategy: OcrStrategy): string {
  switch (strategy) {
    case "fast":
    case "balanced":
      return PREBUILT_READ;
    case "accurate":
      return PREBUILT_LAYOUT;
    default:
      return assertNever(strategy);
  }
}
