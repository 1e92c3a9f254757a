import { z } from "zod";
import { readJsonFile, writeFileAtomic } from "./fs-utils.js";
import type { Log, Manifest, ManifestEntry, RefreshDecision } from "./types.js";

const ManifestEntrySchema = z.object({
  hash: z.string().min(1),
  status: z.enum(["success", "failed"]),
  processedAt: z.string(),
  format: z.enum(["pdf", "docx", "text", "image"]),
  chunkCount: z.number().int().nonnegative(),
  embeddingModel: z.string(),
  chunkingStrategy: z.string(),
});

const ManifestSchema = z.record(z.string(), ManifestEntrySchema);

export interface RefreshExpectation {
  embeddingModel: string;
  chunkingStrategy: string;
  forceRefresh?: boolean;
}

/**
 * SKIP only for a successful entry with the same content hash (and, when an
 * expectation is given, the same embedding model and chunking setup).
 */
export function decide(
  documentId: string,
  currentHash: string,
  manifest: Manifest,
  expect?: RefreshExpectation,
): RefreshDecision {
  const entry = manifest[documentId];
  if (!entry) return "NEW";
  if (expect?.forceRefresh) return "REPROCESS";
  if (entry.hash !== currentHash || entry.status !== "success") return "REPROCESS";
  if (
    expect &&
    (entry.embeddingModel !== expect.embeddingModel ||
      entry.chunkingStrategy !== expect.chunkingStrategy)
  ) {
    return "REPROCESS";
  }
  return "SKIP";
}

export async function loadManifest(manifestPath: string, log?: Log): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = await readJsonFile(manifestPath);
  } catch {
    return {};
  }
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    log?.(`RAG: warning: manifest at ${manifestPath} is malformed, starting from an empty manifest`);
    return {};
  }
  return parsed.data;
}

/**
 * Owns the persisted manifest. Mutations are applied in memory and flushed
 * through a single write chain so concurrent documents never interleave writes.
 */
export class ManifestStore {
  private entries: Manifest = {};
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly manifestPath: string,
    private readonly log?: Log,
  ) {}

  async load(): Promise<Manifest> {
    this.entries = await loadManifest(this.manifestPath, this.log);
    return this.snapshot();
  }

  snapshot(): Manifest {
    return { ...this.entries };
  }

  get(documentId: string): ManifestEntry | undefined {
    return this.entries[documentId];
  }

  ids(): string[] {
    return Object.keys(this.entries).sort();
  }

  async set(documentId: string, entry: ManifestEntry): Promise<void> {
    this.entries[documentId] = entry;
    await this.flush();
  }

  async markFailed(documentId: string): Promise<void> {
    const entry = this.entries[documentId];
    if (!entry) return;
    this.entries[documentId] = { ...entry, status: "failed" };
    await this.flush();
  }

  async remove(documentIds: string[]): Promise<void> {
    let changed = false;
    for (const id of documentIds) {
      if (id in this.entries) {
        delete this.entries[id];
        changed = true;
      }
    }
    if (changed) await this.flush();
  }

  private flush(): Promise<void> {
    const next = this.writeChain.then(() =>
      writeFileAtomic(this.manifestPath, JSON.stringify(this.entries, null, 2)),
    );
    // Later flushes must still run after a failed write.
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}
