import type { TextSegment } from "../types.js";

export interface ChunkingOptions {
  readonly size: number;
  readonly overlap: number;
}

export interface ChunkingResult {
  segments: TextSegment[];
  /** Non-fatal conditions, e.g. empty input. */
  warnings: string[];
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(text: string, options: ChunkingOptions): ChunkingResult;
}
