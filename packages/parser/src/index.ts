export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { OcrSourceParser } from "./ocr-source-parser.js";
export { getParser, isOcrCapable, type ParserLookupOptions } from "./factory.js";
export { decodeText, normalizeMimeType } from "./decode.js";
