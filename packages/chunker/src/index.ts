export type { IChunker } from "./chunker.interface.js";
export { WhitespaceWindowChunker, tokenize } from "./window-chunker.js";
