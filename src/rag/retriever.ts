import { InvalidArgumentError } from "./errors.js";
import { TopK } from "./top-k.js";
import type { Chunk, RetrievalResult, ScoredChunk } from "./types.js";

/** Anything the retriever can scan: the embedding store, or a filtered view of it. */
export interface ChunkSource {
  readonly dimensions: number;
  allChunks(): Iterable<Chunk>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  return denom === 0 ? 0 : dot / denom;
}

/** Score descending, then document id ascending, then ordinal ascending. */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.chunk.documentId !== b.chunk.documentId) {
    return a.chunk.documentId < b.chunk.documentId ? -1 : 1;
  }
  return a.chunk.ordinal - b.chunk.ordinal;
}

/**
 * Full scan over `source`, keeping the `k` best chunks by cosine similarity.
 * Returns fewer than `k` only when the source holds fewer chunks.
 */
export function retrieve(source: ChunkSource, queryVector: readonly number[], k: number): RetrievalResult {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
  }
  if (queryVector.length !== source.dimensions) {
    throw new InvalidArgumentError(
      `query vector has ${queryVector.length} dimensions, store expects ${source.dimensions}`,
    );
  }

  const best = new TopK<ScoredChunk>(k, compareScored);
  for (const chunk of source.allChunks()) {
    best.offer({ chunk, score: cosineSimilarity(queryVector, chunk.vector) });
  }
  return best.toSortedArray();
}

/**
 * Restrict a source to documents whose id starts with `prefix`. An empty or
 * "*" selector keeps the whole corpus.
 */
export function selectCorpus(source: ChunkSource, prefix?: string): ChunkSource {
  if (!prefix || prefix === "*") return source;
  return {
    dimensions: source.dimensions,
    *allChunks() {
      for (const chunk of source.allChunks()) {
        if (chunk.documentId.startsWith(prefix)) yield chunk;
      }
    },
  };
}
