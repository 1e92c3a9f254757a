import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../src/rag/errors.js";
import type { SourceDocument } from "../src/rag/types.js";
import { inspectChunks, validateBatch, validateChunk } from "../src/rag/validation.js";
import { EmbeddingStore } from "../src/rag/vector-store.js";
import { makeChunk, makeTempDir, removeDir } from "./helpers/fakes.js";

function doc(id: string, fingerprint = `fp-${id}`): SourceDocument {
  return {
    id,
    path: `/corpus/${id}`,
    fingerprint,
    format: "text",
    pageCount: 1,
    processedAt: "2024-01-01T00:00:00.000Z",
  };
}

describe("validation", () => {
  it("accepts a well-formed chunk and records its ordinal", () => {
    const seen = new Set<number>();
    validateChunk(makeChunk("a.txt", 0, [1, 0]), 2, seen);
    expect([...seen]).toEqual([0]);
  });

  it("rejects a wrong width, empty text and duplicate ordinals", () => {
    const seen = new Set<number>([0]);
    expect(() => validateChunk(makeChunk("a.txt", 0, [1, 0, 0], "  "), 2, seen)).toThrow(ValidationError);
  });

  it("collects every issue of a batch", () => {
    const batch = [
      makeChunk("a.txt", 0, [1, 0]),
      makeChunk("a.txt", 0, [1]),
      makeChunk("a.txt", 2, [Number.NaN, 1], ""),
    ];
    try {
      validateBatch(batch, 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual([
          "chunk 0: vector has 1 dimensions, expected 2",
          "chunk 0: duplicate ordinal in batch",
          "chunk 2: vector contains non-finite values",
          "chunk 2: text is empty",
        ]);
      }
    }
  });

  it("reports structure without throwing", () => {
    const report = inspectChunks(
      "a.txt",
      [makeChunk("a.txt", 0, [1, 0]), makeChunk("a.txt", 1, [1, 0]), makeChunk("a.txt", 1, [1])],
      2,
    );
    expect(report).toEqual({
      documentId: "a.txt",
      dimensions: 2,
      chunkCount: 3,
      dimensionMismatches: [{ ordinal: 1, length: 1 }],
      emptyChunks: [],
      duplicateOrdinals: [1],
      nonFiniteVectors: [],
      adjacentSimilarity: 1,
      valid: false,
    });
  });
});

describe("EmbeddingStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("stores and returns a document's chunks in ordinal order", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 1, [0, 1]), makeChunk("a.txt", 0, [1, 0])]);

    expect(store.get("a.txt").map((c) => c.ordinal)).toEqual([0, 1]);
    expect(store.getDocument("a.txt").fingerprint).toBe("fp-a.txt");
    expect(store.chunkCount).toBe(2);
    expect([...store.allChunks()]).toHaveLength(2);
  });

  it("throws NotFound for unknown documents", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    expect(() => store.get("missing.txt")).toThrow(NotFoundError);
    await expect(store.inspect("missing.txt")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects a bad batch and keeps the previous chunk set", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0], "old")]);

    await expect(
      store.put(doc("a.txt", "fp-2"), [makeChunk("a.txt", 0, [1, 0], "new"), makeChunk("a.txt", 1, [1, 0, 0])]),
    ).rejects.toBeInstanceOf(ValidationError);

    expect(store.get("a.txt").map((c) => c.text)).toEqual(["old"]);
    expect(store.getDocument("a.txt").fingerprint).toBe("fp-a.txt");
  });

  it("rejects chunks that belong to another document", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await expect(store.put(doc("a.txt"), [makeChunk("b.txt", 0, [1, 0])])).rejects.toThrow(
      "chunk 0: belongs to b.txt, not a.txt",
    );
  });

  it("replaces a chunk set whole and removes the superseded file", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt", "v1"), [makeChunk("a.txt", 0, [1, 0]), makeChunk("a.txt", 1, [1, 0])]);
    await store.put(doc("a.txt", "v2"), [makeChunk("a.txt", 0, [0, 1], "only")]);

    expect(store.get("a.txt").map((c) => c.text)).toEqual(["only"]);
    expect(await readdir(path.join(dir, "chunks"))).toHaveLength(1);
  });

  it("writes a rewrite of the same fingerprint to a new file", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0], "first")]);
    const [before] = await readdir(path.join(dir, "chunks"));

    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [0, 1], "second")]);
    const after = await readdir(path.join(dir, "chunks"));

    expect(after).toHaveLength(1);
    expect(after[0]).not.toBe(before);
    const reopened = new EmbeddingStore(dir, 2);
    await reopened.open();
    expect(reopened.get("a.txt").map((c) => c.text)).toEqual(["second"]);
  });

  it("leaves the committed file untouched when the index swap fails", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0], "first")]);
    const [committed] = await readdir(path.join(dir, "chunks"));
    const committedPath = path.join(dir, "chunks", committed ?? "");
    const original = await readFile(committedPath, "utf-8");

    // A non-empty directory in place of index.json makes the rename fail.
    await rm(path.join(dir, "index.json"));
    await mkdir(path.join(dir, "index.json", "blocker"), { recursive: true });

    await expect(store.put(doc("a.txt"), [makeChunk("a.txt", 0, [0, 1], "second")])).rejects.toThrow();

    expect(await readFile(committedPath, "utf-8")).toBe(original);
    expect(store.get("a.txt").map((c) => c.text)).toEqual(["first"]);
  });

  it("reloads committed documents", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0])]);
    await store.put(doc("b.txt"), [makeChunk("b.txt", 0, [0, 1])]);

    const reopened = new EmbeddingStore(dir, 2);
    const result = await reopened.open();

    expect(result).toEqual({ loaded: ["a.txt", "b.txt"], rejected: [] });
    expect(reopened.documentIds()).toEqual(["a.txt", "b.txt"]);
    expect(reopened.get("b.txt")[0]?.vector).toEqual([0, 1]);
  });

  it("hands out frozen chunks", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0])]);
    const [chunk] = store.get("a.txt");
    expect(Object.isFrozen(chunk)).toBe(true);
    expect(Object.isFrozen(chunk?.vector)).toBe(true);
  });

  it("rejects stored documents of a different width", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0])]);

    const wider = new EmbeddingStore(dir, 3);
    const result = await wider.open();
    expect(result.loaded).toEqual([]);
    expect(result.rejected).toEqual([{ documentId: "a.txt", reason: "stored with 2 dimensions, expected 3" }]);
    expect(wider.has("a.txt")).toBe(false);
  });

  it("rejects a corrupted chunk file and still reports on it", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0]), makeChunk("a.txt", 1, [0, 1])]);

    const [file] = await readdir(path.join(dir, "chunks"));
    const chunkPath = path.join(dir, "chunks", file ?? "");
    const persisted: unknown = JSON.parse(await readFile(chunkPath, "utf-8"));
    const corrupted = JSON.stringify(persisted).replace('"vector":[0,1]', '"vector":[0,1,5]');
    await writeFile(chunkPath, corrupted);

    const reopened = new EmbeddingStore(dir, 2);
    const result = await reopened.open();
    expect(result.rejected.map((r) => r.documentId)).toEqual(["a.txt"]);

    const report = await reopened.inspect("a.txt");
    expect(report.valid).toBe(false);
    expect(report.dimensionMismatches).toEqual([{ ordinal: 1, length: 3 }]);
  });

  it("deletes a document", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0])]);

    expect(await store.delete("a.txt")).toBe(true);
    expect(await store.delete("a.txt")).toBe(false);
    expect(store.has("a.txt")).toBe(false);

    const reopened = new EmbeddingStore(dir, 2);
    expect((await reopened.open()).loaded).toEqual([]);
    expect(await readdir(path.join(dir, "chunks"))).toEqual([]);
  });

  it("removes orphaned chunk files on open", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0])]);
    await writeFile(path.join(dir, "chunks", "leftover.json"), "{}");

    const reopened = new EmbeddingStore(dir, 2);
    await reopened.open();
    expect(await readdir(path.join(dir, "chunks"))).toHaveLength(1);
  });

  it("commits concurrent puts for different documents", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await Promise.all(
      Array.from({ length: 8 }, (_, i) => store.put(doc(`d${i}.txt`), [makeChunk(`d${i}.txt`, 0, [1, 0])])),
    );

    const reopened = new EmbeddingStore(dir, 2);
    expect((await reopened.open()).loaded).toHaveLength(8);
  });

  it("reports a valid document through inspect", async () => {
    const store = new EmbeddingStore(dir, 2);
    await store.open();
    await store.put(doc("a.txt"), [makeChunk("a.txt", 0, [1, 0]), makeChunk("a.txt", 1, [0, 1])]);

    const report = await store.inspect("a.txt");
    expect(report).toMatchObject({ documentId: "a.txt", chunkCount: 2, valid: true, adjacentSimilarity: 0 });
  });
});
