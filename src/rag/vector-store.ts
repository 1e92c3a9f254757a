import { randomUUID } from "node:crypto";
import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { NotFoundError, ValidationError, errorMessage } from "./errors.js";
import { isMissingFile, readJsonFile, writeFileAtomic } from "./fs-utils.js";
import { fingerprint } from "./hasher.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { ChunkSource } from "./retriever.js";
import type { Chunk, Log, SourceDocument, ValidationReport } from "./types.js";
import { inspectChunks, validateBatch } from "./validation.js";

const INDEX_FILE = "index.json";
const CHUNKS_DIR = "chunks";
const INDEX_LOCK = "index";

const SourceDocumentSchema = z.object({
  id: z.string().min(1),
  path: z.string(),
  fingerprint: z.string().min(1),
  format: z.enum(["pdf", "docx", "text", "image"]),
  pageCount: z.number().int().nonnegative(),
  processedAt: z.string(),
});

const StoreIndexSchema = z.object({
  version: z.literal(1),
  dimensions: z.number().int().positive(),
  documents: z.record(
    z.string(),
    z.object({
      file: z.string().min(1),
      document: SourceDocumentSchema,
      chunkCount: z.number().int().nonnegative(),
    }),
  ),
});

const ChunkRecordSchema = z.object({
  ordinal: z.number(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  text: z.string(),
  vector: z.array(z.number()),
  tags: z.array(z.string()).optional(),
});

const DocumentVectorsSchema = z.object({
  documentId: z.string().min(1),
  fingerprint: z.string(),
  chunks: z.array(ChunkRecordSchema),
});

type StoreIndex = z.infer<typeof StoreIndexSchema>;
type DocumentVectors = z.infer<typeof DocumentVectorsSchema>;

interface CommittedDocument {
  document: SourceDocument;
  file: string;
  chunks: readonly Chunk[];
}

export interface OpenResult {
  loaded: string[];
  rejected: Array<{ documentId: string; reason: string }>;
}

function freezeChunks(documentId: string, records: DocumentVectors["chunks"]): readonly Chunk[] {
  return Object.freeze(
    records.map((r) =>
      Object.freeze({
        documentId,
        ordinal: r.ordinal,
        start: r.start,
        end: r.end,
        text: r.text,
        vector: Object.freeze([...r.vector]),
        ...(r.tags ? { tags: Object.freeze([...r.tags]) } : {}),
      }),
    ),
  );
}

/**
 * Per-document chunk sets with their vectors. A document's set is replaced as
 * a whole: the new file and the index are committed before the in-memory swap,
 * so `allChunks()` only ever yields fully committed documents.
 */
export class EmbeddingStore implements ChunkSource {
  private readonly documents = new Map<string, CommittedDocument>();
  private readonly locks = new KeyedMutex();
  private readonly indexLock = new KeyedMutex();
  private readonly indexPath: string;
  private readonly chunksDir: string;

  constructor(
    storeDir: string,
    readonly dimensions: number,
    private readonly log?: Log,
  ) {
    this.indexPath = path.join(storeDir, INDEX_FILE);
    this.chunksDir = path.join(storeDir, CHUNKS_DIR);
  }

  /** Load committed documents from disk. Unloadable ones are left out and reported. */
  async open(): Promise<OpenResult> {
    this.documents.clear();
    const result: OpenResult = { loaded: [], rejected: [] };

    let index: StoreIndex;
    try {
      const parsed = StoreIndexSchema.safeParse(await readJsonFile(this.indexPath));
      if (!parsed.success) {
        this.log?.(`RAG: warning: store index at ${this.indexPath} is malformed, starting empty`);
        return result;
      }
      index = parsed.data;
    } catch (err) {
      if (!isMissingFile(err)) {
        this.log?.(`RAG: warning: cannot read store index: ${errorMessage(err)}`);
      }
      return result;
    }

    const ids = Object.keys(index.documents).sort();
    for (const documentId of ids) {
      const entry = index.documents[documentId];
      if (!entry) continue;
      if (index.dimensions !== this.dimensions) {
        result.rejected.push({
          documentId,
          reason: `stored with ${index.dimensions} dimensions, expected ${this.dimensions}`,
        });
        continue;
      }
      try {
        const vectors = await this.readVectors(entry.file);
        if (vectors.documentId !== documentId) {
          throw new ValidationError([`file ${entry.file} belongs to ${vectors.documentId}`]);
        }
        validateBatch(vectors.chunks, this.dimensions);
        this.documents.set(documentId, {
          document: entry.document,
          file: entry.file,
          chunks: freezeChunks(documentId, vectors.chunks),
        });
        result.loaded.push(documentId);
      } catch (err) {
        result.rejected.push({ documentId, reason: errorMessage(err) });
      }
    }

    // Rejected files stay on disk for `inspect` until the document is rewritten.
    await this.removeOrphans(new Set(Object.values(index.documents).map((e) => e.file)));
    return result;
  }

  /**
   * Replace the whole chunk set of `document.id`. Validation failures reject
   * the batch before anything is written.
   */
  async put(document: SourceDocument, chunks: readonly Chunk[]): Promise<void> {
    const foreign = chunks.filter((c) => c.documentId !== document.id);
    if (foreign.length > 0) {
      throw new ValidationError(
        foreign.map((c) => `chunk ${c.ordinal}: belongs to ${c.documentId}, not ${document.id}`),
      );
    }
    validateBatch(chunks, this.dimensions);

    const ordered = [...chunks].sort((a, b) => a.ordinal - b.ordinal);
    // Fresh name per commit: a rewrite never touches the file the index points at.
    const key = fingerprint(`${document.id}\0${document.fingerprint}`).slice(0, 24);
    const file = `${key}-${randomUUID().slice(0, 8)}.json`;
    const payload: DocumentVectors = {
      documentId: document.id,
      fingerprint: document.fingerprint,
      chunks: ordered.map((c) => ({
        ordinal: c.ordinal,
        start: c.start,
        end: c.end,
        text: c.text,
        vector: [...c.vector],
        ...(c.tags ? { tags: [...c.tags] } : {}),
      })),
    };

    await this.locks.runExclusive(document.id, async () => {
      const previous = this.documents.get(document.id);
      await writeFileAtomic(path.join(this.chunksDir, file), JSON.stringify(payload));

      const committed: CommittedDocument = {
        document: { ...document },
        file,
        chunks: freezeChunks(document.id, payload.chunks),
      };
      await this.indexLock.runExclusive(INDEX_LOCK, async () => {
        await this.persistIndex(new Map(this.documents).set(document.id, committed));
        this.documents.set(document.id, committed);
      });

      if (previous && previous.file !== file) {
        await this.removeFile(previous.file);
      }
    });
  }

  get(documentId: string): readonly Chunk[] {
    const doc = this.documents.get(documentId);
    if (!doc) throw new NotFoundError(`document ${documentId}`);
    return doc.chunks;
  }

  getDocument(documentId: string): SourceDocument {
    const doc = this.documents.get(documentId);
    if (!doc) throw new NotFoundError(`document ${documentId}`);
    return { ...doc.document };
  }

  has(documentId: string): boolean {
    return this.documents.has(documentId);
  }

  documentIds(): string[] {
    return [...this.documents.keys()].sort();
  }

  get chunkCount(): number {
    let n = 0;
    for (const doc of this.documents.values()) n += doc.chunks.length;
    return n;
  }

  /** Remove a document and its chunks. Returns false when it was not stored. */
  async delete(documentId: string): Promise<boolean> {
    return this.locks.runExclusive(documentId, async () => {
      const previous = this.documents.get(documentId);
      if (!previous) return false;
      await this.indexLock.runExclusive(INDEX_LOCK, async () => {
        const next = new Map(this.documents);
        next.delete(documentId);
        await this.persistIndex(next);
        this.documents.delete(documentId);
      });
      await this.removeFile(previous.file);
      return true;
    });
  }

  /**
   * Every committed chunk, document by document. Iterates a snapshot of the
   * document map, so concurrent puts to other documents are not observed
   * half-way.
   */
  *allChunks(): Generator<Chunk> {
    const snapshot = [...this.documents.values()];
    for (const doc of snapshot) {
      yield* doc.chunks;
    }
  }

  /** Structural report read straight from the persisted chunk file. */
  async inspect(documentId: string): Promise<ValidationReport> {
    const doc = this.documents.get(documentId);
    let file = doc?.file;
    if (!file) {
      const onDisk = await this.readIndexEntry(documentId);
      if (!onDisk) throw new NotFoundError(`document ${documentId}`);
      file = onDisk;
    }
    const raw = await readJsonFile(path.join(this.chunksDir, file));
    const parsed = DocumentVectorsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError([`chunk file ${file} is malformed: ${parsed.error.message}`]);
    }
    return inspectChunks(documentId, parsed.data.chunks, this.dimensions);
  }

  private async readVectors(file: string): Promise<DocumentVectors> {
    const parsed = DocumentVectorsSchema.safeParse(await readJsonFile(path.join(this.chunksDir, file)));
    if (!parsed.success) {
      throw new ValidationError([`chunk file ${file} is malformed: ${parsed.error.message}`]);
    }
    return parsed.data;
  }

  private async readIndexEntry(documentId: string): Promise<string | undefined> {
    try {
      const parsed = StoreIndexSchema.safeParse(await readJsonFile(this.indexPath));
      return parsed.success ? parsed.data.documents[documentId]?.file : undefined;
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }

  private async persistIndex(documents: ReadonlyMap<string, CommittedDocument>): Promise<void> {
    const index: StoreIndex = { version: 1, dimensions: this.dimensions, documents: {} };
    for (const [id, doc] of documents) {
      index.documents[id] = { file: doc.file, document: doc.document, chunkCount: doc.chunks.length };
    }
    await writeFileAtomic(this.indexPath, JSON.stringify(index));
  }

  private async removeFile(file: string): Promise<void> {
    try {
      await rm(path.join(this.chunksDir, file), { force: true });
    } catch (err) {
      this.log?.(`RAG: warning: could not remove superseded chunk file ${file}: ${errorMessage(err)}`);
    }
  }

  /** Delete chunk files the index does not point at (left by interrupted writes). */
  private async removeOrphans(referenced: ReadonlySet<string>): Promise<void> {
    let files: string[];
    try {
      files = await readdir(this.chunksDir);
    } catch (err) {
      if (isMissingFile(err)) return;
      throw err;
    }
    for (const file of files) {
      if (!referenced.has(file)) await this.removeFile(file);
    }
  }
}
