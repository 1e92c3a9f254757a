import { rm } from "node:fs/promises";
import path from "node:path";
import { writeFileAtomic } from "./fs-utils.js";
import type { Chunk, Enrichment, SourceDocument } from "./types.js";

export type DocumentOutcomeStatus = "succeeded" | "skipped" | "warning" | "failed" | "cancelled" | "deleted";

export interface DocumentOutcome {
  documentId: string;
  status: DocumentOutcomeStatus;
  details: string;
  chunkCount?: number;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  outcomes: DocumentOutcome[];
  totals: Record<DocumentOutcomeStatus, number>;
}

export interface DocumentExport {
  metadata: {
    source: string;
    format: SourceDocument["format"];
    pageCount: number;
    processedAt: string;
    fingerprint: string;
  };
  chunks: Array<{ ordinal: number; start: number; end: number; text: string; tags?: readonly string[] }>;
  enrichment?: Enrichment;
}

export function buildDocumentExport(
  document: SourceDocument,
  chunks: readonly Chunk[],
  enrichment?: Enrichment,
): DocumentExport {
  return {
    metadata: {
      source: document.id,
      format: document.format,
      pageCount: document.pageCount,
      processedAt: document.processedAt,
      fingerprint: document.fingerprint,
    },
    chunks: chunks.map((c) => ({
      ordinal: c.ordinal,
      start: c.start,
      end: c.end,
      text: c.text,
      ...(c.tags ? { tags: c.tags } : {}),
    })),
    ...(enrichment ? { enrichment } : {}),
  };
}

/** Human-readable export mirroring the document's folder layout. */
export async function writeDocumentExport(exportsDir: string, data: DocumentExport): Promise<string> {
  const target = documentExportPath(exportsDir, data.metadata.source);
  await writeFileAtomic(target, JSON.stringify(data, null, 2));
  return target;
}

export function documentExportPath(exportsDir: string, documentId: string): string {
  return path.join(exportsDir, `${documentId}.json`);
}

export async function removeDocumentExport(exportsDir: string, documentId: string): Promise<void> {
  await rm(documentExportPath(exportsDir, documentId), { force: true });
}

export function summarizeOutcomes(outcomes: readonly DocumentOutcome[]): RunReport["totals"] {
  const totals: RunReport["totals"] = {
    succeeded: 0,
    skipped: 0,
    warning: 0,
    failed: 0,
    cancelled: 0,
    deleted: 0,
  };
  for (const o of outcomes) totals[o.status]++;
  return totals;
}

export function formatRunSummary(report: RunReport): string {
  const t = report.totals;
  const parts = [
    `${t.succeeded} succeeded`,
    `${t.skipped} skipped`,
    `${t.failed} failed`,
  ];
  if (t.warning) parts.push(`${t.warning} with warnings`);
  if (t.deleted) parts.push(`${t.deleted} removed`);
  if (t.cancelled) parts.push(`${t.cancelled} cancelled`);
  return parts.join(", ");
}

export async function writeRunReport(reportsDir: string, report: RunReport): Promise<string> {
  const stamp = report.startedAt.replace(/[:.]/g, "-");
  const target = path.join(reportsDir, `run-${stamp}.json`);
  await writeFileAtomic(target, JSON.stringify(report, null, 2));
  return target;
}
