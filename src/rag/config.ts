import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";
import type { DocumentFormat } from "./types.js";

export interface RagConfig {
  readonly sourceDir: string;
  readonly cacheDir: string;
  readonly manifestPath: string;
  readonly storeDir: string;
  readonly exportsDir: string;
  readonly reportsDir: string;

  readonly supportedFormats: readonly string[];
  readonly forceRefresh: boolean;

  readonly embeddingModel: string;
  readonly embeddingDimensions: number;
  readonly embeddingConcurrency: number;
  readonly documentConcurrency: number;
  readonly queryPrefix: string;

  readonly generationModel: string;
  readonly topK: number;
  readonly scoreThreshold: number;

  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly chunkingStrategy: string;

  readonly normalizeToMarkdown: boolean;
  readonly boilerplatePatterns: readonly string[];

  readonly requestTimeoutMs: number;
  readonly maxAttempts: number;
  readonly retryBaseDelayMs: number;

  readonly enrich: boolean;
  readonly enrichmentMaxChars: number;
}

export const DEFAULT_RAG_CONFIG = {
  sourceDir: "data",
  cacheDir: ".rag-cache",

  supportedFormats: ["pdf", "docx", "txt", "md", "png", "jpg", "jpeg", "tif", "tiff"],
  forceRefresh: false,

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingDimensions: 4096,
  embeddingConcurrency: 5,
  documentConcurrency: 2,

  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",

  generationModel: "qwen/qwen3.5-122b-a10b",
  topK: 5,
  scoreThreshold: 0.3,

  chunkSize: 400,
  chunkOverlap: 50,
  chunkingStrategy: "fixed-window",

  normalizeToMarkdown: false,
  boilerplatePatterns: ["Page \\d+ of \\d+"],

  requestTimeoutMs: 60_000,
  maxAttempts: 3,
  retryBaseDelayMs: 500,

  enrich: false,
  enrichmentMaxChars: 4000,
} as const;

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  pdf: "pdf",
  docx: "docx",
  txt: "text",
  md: "text",
  png: "image",
  jpg: "image",
  jpeg: "image",
  tif: "image",
  tiff: "image",
};

export function formatForExtension(ext: string): DocumentFormat | undefined {
  return FORMAT_BY_EXTENSION[ext.toLowerCase().replace(/^\./, "")];
}

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, "gi");
    return true;
  } catch {
    return false;
  }
}

export const RagConfigSchema = z
  .object({
    sourceDir: z.string().min(1),
    cacheDir: z.string().min(1),
    supportedFormats: z.array(z.string().min(1)).min(1),
    forceRefresh: z.boolean(),
    embeddingModel: z.string().min(1),
    embeddingDimensions: z.number().int().positive(),
    embeddingConcurrency: z.number().int().positive(),
    documentConcurrency: z.number().int().positive(),
    queryPrefix: z.string(),
    generationModel: z.string().min(1),
    topK: z.number().int().positive(),
    scoreThreshold: z.number().min(-1).max(1),
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    chunkingStrategy: z.string().min(1),
    normalizeToMarkdown: z.boolean(),
    boilerplatePatterns: z.array(z.string().refine(isValidPattern, { message: "not a valid regular expression" })),
    requestTimeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    enrich: z.boolean(),
    enrichmentMaxChars: z.number().int().positive(),
  })
  .partial()
  .strict();

export type RagConfigInput = z.infer<typeof RagConfigSchema>;

/**
 * Build a frozen config from defaults plus overrides. Relative directories are
 * resolved against `baseDir` (the config file's folder, or cwd).
 */
export function createRagConfig(
  overrides: RagConfigInput = {},
  baseDir: string = process.cwd(),
): RagConfig {
  const merged = { ...DEFAULT_RAG_CONFIG, ...overrides };
  if (merged.chunkOverlap >= merged.chunkSize) {
    throw new InvalidArgumentError(
      `chunkOverlap (${merged.chunkOverlap}) must be smaller than chunkSize (${merged.chunkSize})`,
    );
  }
  const badPattern = merged.boilerplatePatterns.find((p) => !isValidPattern(p));
  if (badPattern !== undefined) {
    throw new InvalidArgumentError(`boilerplate pattern ${JSON.stringify(badPattern)} is not a valid regular expression`);
  }

  const sourceDir = path.resolve(baseDir, merged.sourceDir);
  const cacheDir = path.resolve(baseDir, merged.cacheDir);

  return Object.freeze({
    ...merged,
    sourceDir,
    cacheDir,
    manifestPath: path.join(cacheDir, "manifest.json"),
    storeDir: path.join(cacheDir, "store"),
    exportsDir: path.join(cacheDir, "exports"),
    reportsDir: path.join(cacheDir, "reports"),
    supportedFormats: Object.freeze([...merged.supportedFormats]),
    boilerplatePatterns: Object.freeze([...merged.boilerplatePatterns]),
  });
}

function envOverrides(env: NodeJS.ProcessEnv): RagConfigInput {
  const out: RagConfigInput = {};
  const sourceDir = env["RAG_SOURCE_DIR"]?.trim();
  if (sourceDir) out.sourceDir = sourceDir;
  const cacheDir = env["RAG_CACHE_DIR"]?.trim();
  if (cacheDir) out.cacheDir = cacheDir;
  const force = (env["RAG_FORCE_REFRESH"] ?? "").trim().toLowerCase();
  if (force) out.forceRefresh = force === "1" || force === "true" || force === "yes" || force === "on";
  return out;
}

function parseConfigInput(raw: unknown, origin: string): RagConfigInput {
  const parsed = RagConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new InvalidArgumentError(`Invalid config ${origin}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Load the pipeline config from an optional JSON file, then apply RAG_* env
 * overrides. Env paths resolve against cwd, file paths against the file.
 */
export async function loadRagConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RagConfig> {
  let fromFile: RagConfigInput = {};
  let baseDir = process.cwd();

  if (configPath) {
    const abs = path.resolve(configPath);
    let raw: string;
    try {
      raw = await readFile(abs, "utf-8");
    } catch (err) {
      throw new InvalidArgumentError(`Cannot read config ${abs}: ${String(err)}`);
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new InvalidArgumentError(`Config ${abs} is not valid JSON`);
    }
    fromFile = parseConfigInput(json, abs);
    baseDir = path.dirname(abs);
    if (fromFile.sourceDir) fromFile.sourceDir = path.resolve(baseDir, fromFile.sourceDir);
    if (fromFile.cacheDir) fromFile.cacheDir = path.resolve(baseDir, fromFile.cacheDir);
  }

  const fromEnv = envOverrides(env);
  return createRagConfig({ ...fromFile, ...fromEnv }, process.cwd());
}

export function chunkingStrategyKey(config: Pick<RagConfig, "chunkingStrategy" | "chunkSize" | "chunkOverlap">): string {
  return `${config.chunkingStrategy}:${config.chunkSize}:${config.chunkOverlap}`;
}
