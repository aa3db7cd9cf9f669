import type { ChunkWindow, ChunkingConfig } from "@indexflow/types";
import type { IChunker } from "./chunker.interface.js";

const TOKEN_PATTERN = /\S+/g;

/** Whitespace-separated tokens; an approximation, not a model tokenizer. */
export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

/**
 * Overlapping token windows.
 * A window starts at every multiple of `stride = max(1, maxTokens - overlap)`
 * below the token count, so trailing windows may be shorter than maxTokens.
 */
export class WhitespaceWindowChunker implements IChunker {
  readonly strategy = "whitespace-window";

  chunk(content: string, config: ChunkingConfig): ChunkWindow[] {
    const { maxTokens, overlap } = config;
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new RangeError(`maxTokens must be a positive integer, got ${String(maxTokens)}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
      throw new RangeError(`overlap must be a non-negative integer, got ${String(overlap)}`);
    }

    const tokens = tokenize(content);
    const stride = Math.max(1, maxTokens - overlap);
    const results: ChunkWindow[] = [];

    for (let start = 0; start < tokens.length; start += stride) {
      const windowTokens = tokens.slice(start, start + maxTokens);
      results.push({
        content: windowTokens.join(" "),
        index: results.length,
        tokenCount: windowTokens.length,
        startToken: start,
        endToken: start + windowTokens.length,
      });
    }

    return results;
  }
}
