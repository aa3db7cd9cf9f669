export type { IOcrProvider } from "./ocr-provider.interface.js";
export { modelForStrategy, PREBUILT_READ, PREBUILT_LAYOUT } from "./models.js";
export { AzureDocumentIntelligenceProvider, type AzureOcrConfig } from "./azure-provider.js";
