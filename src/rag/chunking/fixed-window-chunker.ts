import { InvalidArgumentError } from "../errors.js";
import type { TextSegment } from "../types.js";
import type { ChunkingOptions, ChunkingResult, ChunkingStrategy } from "./types.js";

export function assertChunkingOptions({ size, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new InvalidArgumentError(`chunk overlap must satisfy 0 <= overlap < size, got ${overlap}`);
  }
}

/**
 * Fixed-size windows advancing by `size - overlap`. The last window may be
 * shorter and is the first one to reach the end of the text, so for text
 * longer than `size` the count is ceil((length - overlap) / (size - overlap)).
 */
export function chunkText(text: string, options: ChunkingOptions): ChunkingResult {
  assertChunkingOptions(options);
  const { size, overlap } = options;

  if (text.length === 0) {
    return { segments: [], warnings: ["text is empty, no chunks produced"] };
  }

  const step = size - overlap;
  const segments: TextSegment[] = [];
  for (let start = 0; ; start += step) {
    const end = Math.min(start + size, text.length);
    segments.push({ ordinal: segments.length, start, end, text: text.slice(start, end) });
    if (end >= text.length) break;
  }
  return { segments, warnings: [] };
}

export class FixedWindowChunker implements ChunkingStrategy {
  readonly name = "fixed-window";

  chunk(text: string, options: ChunkingOptions): ChunkingResult {
    return chunkText(text, options);
  }
}
