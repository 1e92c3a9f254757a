import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_RAG_CONFIG,
  chunkingStrategyKey,
  createRagConfig,
  formatForExtension,
  loadRagConfig,
} from "../src/rag/config.js";
import { InvalidArgumentError } from "../src/rag/errors.js";
import { makeTempDir, removeDir } from "./helpers/fakes.js";

describe("createRagConfig", () => {
  it("applies defaults and derives cache paths", () => {
    const config = createRagConfig({}, "/srv/app");

    expect(config.sourceDir).toBe(path.resolve("/srv/app", "data"));
    expect(config.manifestPath).toBe(path.join(path.resolve("/srv/app", ".rag-cache"), "manifest.json"));
    expect(config.storeDir).toBe(path.join(path.resolve("/srv/app", ".rag-cache"), "store"));
    expect(config.chunkSize).toBe(DEFAULT_RAG_CONFIG.chunkSize);
    expect(config.topK).toBe(5);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => createRagConfig({ chunkSize: 100, chunkOverlap: 100 })).toThrow(InvalidArgumentError);
  });

  it("rejects a boilerplate pattern that does not compile", () => {
    expect(() => createRagConfig({ boilerplatePatterns: ["Page \\d+", "(unclosed"] })).toThrow(
      'boilerplate pattern "(unclosed" is not a valid regular expression',
    );
  });

  it("keys the chunking setup by strategy, size and overlap", () => {
    expect(chunkingStrategyKey(createRagConfig({ chunkSize: 300, chunkOverlap: 30 }))).toBe("fixed-window:300:30");
  });
});

describe("formatForExtension", () => {
  it("maps extensions to document formats", () => {
    expect(formatForExtension(".PDF")).toBe("pdf");
    expect(formatForExtension("md")).toBe("text");
    expect(formatForExtension("tiff")).toBe("image");
    expect(formatForExtension("exe")).toBeUndefined();
  });
});

describe("loadRagConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("resolves file paths relative to the config file", async () => {
    const file = path.join(dir, "pipeline.json");
    await writeFile(file, JSON.stringify({ sourceDir: "docs", topK: 3 }));

    const config = await loadRagConfig(file, {});

    expect(config.sourceDir).toBe(path.join(dir, "docs"));
    expect(config.topK).toBe(3);
  });

  it("lets RAG_* variables override the file", async () => {
    const file = path.join(dir, "pipeline.json");
    await writeFile(file, JSON.stringify({ forceRefresh: false }));

    const config = await loadRagConfig(file, { RAG_FORCE_REFRESH: "true", RAG_CACHE_DIR: path.join(dir, "cache") });

    expect(config.forceRefresh).toBe(true);
    expect(config.manifestPath).toBe(path.join(dir, "cache", "manifest.json"));
  });

  it("rejects unknown keys and bad values", async () => {
    const file = path.join(dir, "pipeline.json");
    await writeFile(file, JSON.stringify({ topK: 0, colour: "blue" }));

    await expect(loadRagConfig(file, {})).rejects.toThrow(InvalidArgumentError);
  });

  it("names the boilerplate pattern that does not compile", async () => {
    const file = path.join(dir, "pipeline.json");
    await writeFile(file, JSON.stringify({ boilerplatePatterns: ["Draft", "[a-"] }));

    await expect(loadRagConfig(file, {})).rejects.toThrow(
      `Invalid config ${file}: boilerplatePatterns.1: not a valid regular expression`,
    );
  });

  it("rejects a file that is not JSON", async () => {
    const file = path.join(dir, "pipeline.json");
    await writeFile(file, "topK = 3");

    await expect(loadRagConfig(file, {})).rejects.toThrow(`Config ${file} is not valid JSON`);
  });
});
