import { InvalidArgumentError } from "../errors.js";
import type { ChunkingStrategy } from "./types.js";
import { FixedWindowChunker } from "./fixed-window-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new InvalidArgumentError(`Unknown chunking strategy: ${name}`);
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new FixedWindowChunker());

export { FixedWindowChunker, chunkText, assertChunkingOptions } from "./fixed-window-chunker.js";
export type { ChunkingOptions, ChunkingResult, ChunkingStrategy } from "./types.js";
