import { ValidationError } from "./errors.js";
import { cosineSimilarity } from "./retriever.js";
import type { Chunk, ValidationReport } from "./types.js";

export type ChunkRecord = Pick<Chunk, "ordinal" | "text" | "vector">;

function chunkIssues(chunk: ChunkRecord, dimensions: number, seenOrdinals: Set<number>): string[] {
  const issues: string[] = [];
  const label = `chunk ${chunk.ordinal}`;
  if (!Number.isInteger(chunk.ordinal) || chunk.ordinal < 0) {
    issues.push(`${label}: ordinal must be a non-negative integer`);
  }
  if (chunk.vector.length !== dimensions) {
    issues.push(`${label}: vector has ${chunk.vector.length} dimensions, expected ${dimensions}`);
  } else if (!chunk.vector.every(Number.isFinite)) {
    issues.push(`${label}: vector contains non-finite values`);
  }
  if (chunk.text.trim().length === 0) {
    issues.push(`${label}: text is empty`);
  }
  if (seenOrdinals.has(chunk.ordinal)) {
    issues.push(`${label}: duplicate ordinal in batch`);
  }
  return issues;
}

/**
 * Reject a chunk whose vector width is not `dimensions`, whose text is empty,
 * or whose ordinal is already in `seenOrdinals`. Records the ordinal on success.
 */
export function validateChunk(chunk: ChunkRecord, dimensions: number, seenOrdinals: Set<number>): void {
  const issues = chunkIssues(chunk, dimensions, seenOrdinals);
  if (issues.length > 0) throw new ValidationError(issues);
  seenOrdinals.add(chunk.ordinal);
}

/** Validate a full write batch, collecting every issue before failing. */
export function validateBatch(chunks: readonly ChunkRecord[], dimensions: number): void {
  const seen = new Set<number>();
  const issues: string[] = [];
  for (const chunk of chunks) {
    issues.push(...chunkIssues(chunk, dimensions, seen));
    seen.add(chunk.ordinal);
  }
  if (issues.length > 0) throw new ValidationError(issues);
}

/** Structural report over persisted records; never throws on bad data. */
export function inspectChunks(
  documentId: string,
  chunks: readonly ChunkRecord[],
  dimensions: number,
): ValidationReport {
  const dimensionMismatches: ValidationReport["dimensionMismatches"] = [];
  const emptyChunks: number[] = [];
  const duplicateOrdinals: number[] = [];
  const nonFiniteVectors: number[] = [];
  const seen = new Set<number>();

  for (const chunk of chunks) {
    if (chunk.vector.length !== dimensions) {
      dimensionMismatches.push({ ordinal: chunk.ordinal, length: chunk.vector.length });
    } else if (!chunk.vector.every(Number.isFinite)) {
      nonFiniteVectors.push(chunk.ordinal);
    }
    if (chunk.text.trim().length === 0) emptyChunks.push(chunk.ordinal);
    if (seen.has(chunk.ordinal)) duplicateOrdinals.push(chunk.ordinal);
    seen.add(chunk.ordinal);
  }

  let adjacentSimilarity: number | null = null;
  if (chunks.length > 1) {
    let sum = 0;
    for (let i = 0; i + 1 < chunks.length; i++) {
      const a = chunks[i];
      const b = chunks[i + 1];
      if (a && b) sum += cosineSimilarity(a.vector, b.vector);
    }
    adjacentSimilarity = sum / (chunks.length - 1);
  }

  return {
    documentId,
    dimensions,
    chunkCount: chunks.length,
    dimensionMismatches,
    emptyChunks,
    duplicateOrdinals,
    nonFiniteVectors,
    adjacentSimilarity,
    valid:
      dimensionMismatches.length === 0 &&
      emptyChunks.length === 0 &&
      duplicateOrdinals.length === 0 &&
      nonFiniteVectors.length === 0,
  };
}
