import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { formatForExtension } from "./config.js";
import { isMissingFile } from "./fs-utils.js";
import type { DocumentFormat, Log } from "./types.js";

export interface ScannedFile {
  id: string;
  path: string;
  format: DocumentFormat;
}

export interface ScanResult {
  files: ScannedFile[];
  /** Ids known to the manifest that no longer exist on disk. */
  deleted: string[];
}

function toDocumentId(relPath: string): string {
  return relPath.split(path.sep).join("/");
}

/**
 * Collapse files that share a folder and base name (report.pdf, report.docx)
 * to a single document, preferring the PDF.
 */
function dedupeByBaseName(files: ScannedFile[], log?: Log): ScannedFile[] {
  const groups = new Map<string, ScannedFile[]>();
  for (const file of files) {
    const ext = path.posix.extname(file.id);
    const key = file.id.slice(0, file.id.length - ext.length);
    const group = groups.get(key);
    if (group) group.push(file);
    else groups.set(key, [file]);
  }

  const selected: ScannedFile[] = [];
  for (const [key, group] of groups) {
    const pick = group.find((f) => f.format === "pdf") ?? group[0];
    if (!pick) continue;
    if (group.length > 1) {
      log?.(`RAG: ${group.length} versions of ${key}, using ${pick.id}`);
    }
    selected.push(pick);
  }
  return selected.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (err) {
    if (isMissingFile(err)) return false;
    throw err;
  }
}

export async function scanFiles(
  sourceDir: string,
  supportedFormats: readonly string[],
  knownIds: Iterable<string>,
  log?: Log,
): Promise<ScanResult> {
  // No folder is not an empty folder: known documents stay.
  if (!(await isDirectory(sourceDir))) {
    log?.(`RAG: warning: source folder ${sourceDir} is missing or not a folder, nothing scanned`);
    return { files: [], deleted: [] };
  }

  const patterns = supportedFormats.map((ext) => `**/*.${ext}`);
  const found = await fg(patterns, {
    cwd: sourceDir,
    onlyFiles: true,
    dot: false,
    caseSensitiveMatch: false,
  });

  const files: ScannedFile[] = [];
  for (const rel of [...found].sort()) {
    const format = formatForExtension(path.extname(rel));
    if (!format) continue;
    files.push({
      id: toDocumentId(rel),
      path: path.resolve(sourceDir, rel),
      format,
    });
  }

  const unique = dedupeByBaseName(files, log);
  const present = new Set(unique.map((f) => f.id));
  const deleted = [...knownIds].filter((id) => !present.has(id)).sort();

  return { files: unique, deleted };
}
