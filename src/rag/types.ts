export type DocumentFormat = "pdf" | "docx" | "text" | "image";

export type Log = (msg: string) => void;

export interface SourceDocument {
  /** Path relative to the source folder, `/`-separated. */
  id: string;
  /** Absolute path on disk. */
  path: string;
  fingerprint: string;
  format: DocumentFormat;
  pageCount: number;
  processedAt: string;
}

export interface TextSegment {
  ordinal: number;
  /** Offsets into the canonical text, half-open. */
  start: number;
  end: number;
  text: string;
}

export interface Chunk extends TextSegment {
  documentId: string;
  vector: readonly number[];
  tags?: readonly string[];
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export type RetrievalResult = ScoredChunk[];

export type RefreshDecision = "SKIP" | "REPROCESS" | "NEW";

export type ManifestStatus = "success" | "failed";

export interface ManifestEntry {
  hash: string;
  status: ManifestStatus;
  processedAt: string;
  format: DocumentFormat;
  chunkCount: number;
  embeddingModel: string;
  chunkingStrategy: string;
}

export interface Manifest {
  [documentId: string]: ManifestEntry;
}

export interface ExtractedText {
  text: string;
  pageCount: number;
}

export interface Enrichment {
  summary: string;
  tags: string[];
  classification: string;
}

export interface ContextBlock {
  citation: string;
  chunkId: string;
  documentId: string;
  ordinal: number;
  score: number;
  text: string;
}

export interface GroundedRequest {
  question: string;
  system: string;
  user: string;
  context: ContextBlock[];
  /** Chunk ids in context order. */
  citations: string[];
  contextless: boolean;
}

export interface ValidationReport {
  documentId: string;
  dimensions: number;
  chunkCount: number;
  dimensionMismatches: Array<{ ordinal: number; length: number }>;
  emptyChunks: number[];
  duplicateOrdinals: number[];
  nonFiniteVectors: number[];
  /** Mean cosine similarity of consecutive chunks; null with fewer than two. */
  adjacentSimilarity: number | null;
  valid: boolean;
}

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}#${ordinal}`;
}
