import { chunkingStrategyKey, type RagConfig } from "./config.js";
import { getChunkingStrategy } from "./chunking/index.js";
import { assemblePrompt, formatSources, NO_ANSWER } from "./context-builder.js";
import { embedCallOptions, embedQuery, embedTexts, type EmbeddingService } from "./embedding-service.js";
import { enrichDocument } from "./enrichment.js";
import {
  GenerationUnavailableError,
  InvalidArgumentError,
  RunCancelledError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import {
  buildDocumentExport,
  formatRunSummary,
  summarizeOutcomes,
  removeDocumentExport,
  writeDocumentExport,
  writeRunReport,
  type DocumentOutcome,
  type RunReport,
} from "./export.js";
import { extract } from "./extractors/index.js";
import { scanFiles, type ScannedFile } from "./file-scanner.js";
import type { GenerationService } from "./generation-service.js";
import { hashFile } from "./hasher.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { decide, ManifestStore } from "./manifest.js";
import { normalizeText } from "./normalizer.js";
import { withTimeout } from "./retry.js";
import { retrieve, selectCorpus } from "./retriever.js";
import type { Chunk, Enrichment, Log, RetrievalResult, SourceDocument, ValidationReport } from "./types.js";
import { EmbeddingStore } from "./vector-store.js";
import { mapWithConcurrency } from "./worker-pool.js";

export interface RagDeps {
  config: RagConfig;
  store: EmbeddingStore;
  manifest: ManifestStore;
  embeddings: EmbeddingService;
  /** Needed for `ask` and for enrichment. */
  generation?: GenerationService;
  documentLocks: KeyedMutex;
  log: Log;
  now: () => Date;
}

export function createRagDeps(
  config: RagConfig,
  services: { embeddings: EmbeddingService; generation?: GenerationService; log?: Log; now?: () => Date },
): RagDeps {
  const log = services.log ?? (() => {});
  if (services.embeddings.dimensions !== config.embeddingDimensions) {
    throw new InvalidArgumentError(
      `embedding service produces ${services.embeddings.dimensions} dimensions, config expects ${config.embeddingDimensions}`,
    );
  }
  return {
    config,
    store: new EmbeddingStore(config.storeDir, config.embeddingDimensions, log),
    manifest: new ManifestStore(config.manifestPath, log),
    embeddings: services.embeddings,
    generation: services.generation,
    documentLocks: new KeyedMutex(),
    log,
    now: services.now ?? (() => new Date()),
  };
}

export interface Answer {
  answer: string;
  /** False when nothing relevant was retrieved and the model was not asked. */
  grounded: boolean;
  citations: string[];
  sources: string;
  retrieved: RetrievalResult;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface AskOptions {
  /** Document id prefix limiting the search, e.g. "guidelines/". */
  corpusSelector?: string;
  signal?: AbortSignal;
}

/** Load committed chunks and the manifest, reconciling the two. */
/** Load committed chunks only; the manifest is left untouched. */
export async function openStore(deps: RagDeps): Promise<void> {
  const { store, log } = deps;
  const opened = await store.open();
  for (const { documentId, reason } of opened.rejected) {
    log(`RAG: warning: stored chunks for ${documentId} rejected (${reason}), will reprocess`);
  }
  log(`RAG ready: ${store.documentIds().length} document(s), ${store.chunkCount} chunks`);
}

export async function openCorpus(deps: RagDeps): Promise<void> {
  const { store, manifest } = deps;
  await openStore(deps);
  await manifest.load();

  // A manifest entry without committed chunks must not be skipped next time.
  for (const id of manifest.ids()) {
    if (manifest.get(id)?.status === "success" && !store.has(id)) {
      await manifest.markFailed(id);
    }
  }
}

function cancelledOutcome(documentId: string): DocumentOutcome {
  return { documentId, status: "cancelled", details: "Run cancelled before the document was committed" };
}

async function processDocument(
  deps: RagDeps,
  file: ScannedFile,
  hash: string,
  signal?: AbortSignal,
): Promise<DocumentOutcome> {
  const { config, store, manifest, embeddings, generation, log } = deps;

  log(`RAG: extracting ${file.id}...`);
  const extracted = await withTimeout(
    `extraction of ${file.id}`,
    config.requestTimeoutMs,
    (s) => extract(file.path, file.format, s),
    signal,
  );

  const canonical = normalizeText(extracted.text, {
    boilerplatePatterns: config.boilerplatePatterns,
    toMarkdown: config.normalizeToMarkdown,
  });

  const strategy = getChunkingStrategy(config.chunkingStrategy);
  const { segments, warnings } = strategy.chunk(canonical, {
    size: config.chunkSize,
    overlap: config.chunkOverlap,
  });
  for (const w of warnings) log(`RAG: warning: ${file.id}: ${w}`);

  log(`RAG: embedding ${file.id} (${segments.length} chunks)...`);
  const vectors = await embedTexts(
    embeddings,
    segments.map((s) => s.text),
    {
      ...embedCallOptions(config, { signal, log }),
      concurrency: config.embeddingConcurrency,
      onProgress: (done, total) => log(`RAG: embedding ${file.id}: ${done}/${total}`),
    },
  );

  let enrichment: Enrichment | undefined;
  if (config.enrich && generation && segments.length > 0) {
    try {
      enrichment = await enrichDocument(generation, canonical, config.enrichmentMaxChars, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      log(`RAG: warning: enrichment failed for ${file.id}: ${errorMessage(err)}`);
    }
  }

  const chunks: Chunk[] = [];
  for (const segment of segments) {
    const vector = vectors[segment.ordinal];
    if (!vector) throw new ValidationError([`chunk ${segment.ordinal}: no vector returned`]);
    chunks.push({
      ...segment,
      documentId: file.id,
      vector,
      ...(enrichment && enrichment.tags.length > 0 ? { tags: enrichment.tags } : {}),
    });
  }

  // Cancellation is honoured up to here; once put starts the document commits.
  if (signal?.aborted) throw new RunCancelledError();

  const document: SourceDocument = {
    id: file.id,
    path: file.path,
    fingerprint: hash,
    format: file.format,
    pageCount: extracted.pageCount,
    processedAt: deps.now().toISOString(),
  };
  await store.put(document, chunks);
  await writeDocumentExport(config.exportsDir, buildDocumentExport(document, chunks, enrichment));
  await manifest.set(file.id, {
    hash,
    status: "success",
    processedAt: document.processedAt,
    format: file.format,
    chunkCount: chunks.length,
    embeddingModel: embeddings.model,
    chunkingStrategy: chunkingStrategyKey(config),
  });

  log(`RAG: ${file.id} done (${chunks.length} chunks)`);
  return warnings.length > 0
    ? { documentId: file.id, status: "warning", details: warnings.join("; "), chunkCount: chunks.length }
    : { documentId: file.id, status: "succeeded", details: "processed", chunkCount: chunks.length };
}

/** Hash, decide, and (when needed) process one file. Never throws. */
async function refreshFile(deps: RagDeps, file: ScannedFile, signal?: AbortSignal): Promise<DocumentOutcome> {
  return deps.documentLocks.runExclusive(file.id, async () => {
    if (signal?.aborted) return cancelledOutcome(file.id);
    try {
      const hash = await hashFile(file.path);
      const decision = decide(file.id, hash, deps.manifest.snapshot(), {
        embeddingModel: deps.embeddings.model,
        chunkingStrategy: chunkingStrategyKey(deps.config),
        forceRefresh: deps.config.forceRefresh,
      });
      if (decision === "SKIP") {
        return { documentId: file.id, status: "skipped", details: "unchanged" };
      }
      deps.log(`RAG: ${decision === "NEW" ? "new" : "changed"} file ${file.id}`);
      return await processDocument(deps, file, hash, signal);
    } catch (err) {
      if (signal?.aborted) {
        deps.log(`RAG: ${file.id} rolled back (run cancelled)`);
        return cancelledOutcome(file.id);
      }
      deps.log(`RAG: failed ${file.id}: ${errorMessage(err)}`);
      return { documentId: file.id, status: "failed", details: errorMessage(err) };
    }
  });
}

/**
 * One ingest-or-refresh cycle over the source folder. A failing document is
 * reported and the run continues; the manifest only records documents whose
 * chunks were fully committed.
 */
export async function runPipeline(deps: RagDeps, options: RunOptions = {}): Promise<RunReport> {
  const { config, store, manifest, log } = deps;
  const { signal } = options;
  const startedAt = deps.now().toISOString();
  const outcomes: DocumentOutcome[] = [];

  await openCorpus(deps);

  log(`RAG: scanning ${config.sourceDir}...`);
  const known = new Set([...manifest.ids(), ...store.documentIds()]);
  const scan = await scanFiles(config.sourceDir, config.supportedFormats, known, log);

  if (scan.deleted.length > 0) {
    log(`RAG: cleaning up ${scan.deleted.length} deleted file(s)`);
    for (const id of scan.deleted) {
      await deps.documentLocks.runExclusive(id, async () => {
        await store.delete(id);
        await manifest.remove([id]);
        await removeDocumentExport(config.exportsDir, id);
      });
      outcomes.push({ documentId: id, status: "deleted", details: "source file removed" });
    }
  }

  const results = await mapWithConcurrency(scan.files, (file) => refreshFile(deps, file, signal), {
    concurrency: config.documentConcurrency,
    signal,
  });
  scan.files.forEach((file, i) => {
    const r = results[i];
    outcomes.push(r?.status === "done" ? r.value : cancelledOutcome(file.id));
  });

  const skipped = outcomes.filter((o) => o.status === "skipped").length;
  if (skipped > 0) log(`RAG: ${skipped} file(s) cached, skipping`);

  const report: RunReport = {
    startedAt,
    finishedAt: deps.now().toISOString(),
    cancelled: signal?.aborted ?? false,
    outcomes,
    totals: summarizeOutcomes(outcomes),
  };

  try {
    const reportPath = await writeRunReport(config.reportsDir, report);
    log(`RAG: run report written to ${reportPath}`);
  } catch (err) {
    log(`RAG: warning: could not write run report: ${errorMessage(err)}`);
  }
  log(`RAG: run finished: ${formatRunSummary(report)}`);
  return report;
}

export function runFailed(report: RunReport): boolean {
  return report.totals.failed > 0;
}

/**
 * Embed the question, retrieve, assemble the grounded request and generate.
 * With nothing relevant retrieved the fixed no-answer reply is returned and
 * the model is never called.
 */
export async function ask(deps: RagDeps, question: string, options: AskOptions = {}): Promise<Answer> {
  const { config, store, embeddings, generation } = deps;
  const trimmed = question.trim();
  if (!trimmed) throw new InvalidArgumentError("question must not be empty");

  const queryVector = await embedQuery(embeddings, trimmed, config, options.signal);
  const retrieved = retrieve(selectCorpus(store, options.corpusSelector), queryVector, config.topK).filter(
    (r) => r.score >= config.scoreThreshold,
  );

  const request = assemblePrompt(trimmed, retrieved);
  if (request.contextless) {
    return { answer: NO_ANSWER, grounded: false, citations: [], sources: "", retrieved };
  }
  if (!generation) throw new GenerationUnavailableError("No generation service configured");

  const answer = await generation.generate(request, options.signal);
  return {
    answer,
    grounded: true,
    citations: request.citations,
    sources: formatSources(retrieved),
    retrieved,
  };
}

export function validateDocument(deps: RagDeps, documentId: string): Promise<ValidationReport> {
  return deps.store.inspect(documentId);
}

export interface RunCoordinator {
  run(options?: RunOptions): Promise<RunReport>;
  ask(question: string, options?: AskOptions): Promise<Answer>;
  validate(documentId: string): Promise<ValidationReport>;
  readonly documentCount: number;
  readonly chunkCount: number;
}

export function createRunCoordinator(deps: RagDeps): RunCoordinator {
  return {
    run: (options) => runPipeline(deps, options),
    ask: (question, options) => ask(deps, question, options),
    validate: (documentId) => validateDocument(deps, documentId),
    get documentCount() {
      return deps.store.documentIds().length;
    },
    get chunkCount() {
      return deps.store.chunkCount;
    },
  };
}
