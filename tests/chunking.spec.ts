import { describe, expect, it } from "vitest";
import { chunkText, getChunkingStrategy, registerChunkingStrategy } from "../src/rag/chunking/index.js";
import { InvalidArgumentError } from "../src/rag/errors.js";

function alphabetText(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
}

describe("chunkText", () => {
  it("cuts 10000 characters into 29 windows of 400 with 50 overlap", () => {
    const text = alphabetText(10_000);
    const { segments, warnings } = chunkText(text, { size: 400, overlap: 50 });

    expect(warnings).toEqual([]);
    expect(segments).toHaveLength(29);
    expect(segments.map((s) => s.ordinal)).toEqual(Array.from({ length: 29 }, (_, i) => i));

    const last = segments[28];
    expect(last?.start).toBe(9800);
    expect(last?.end).toBe(10_000);
    expect(last?.text).toHaveLength(200);

    for (const segment of segments.slice(0, 28)) {
      expect(segment.text).toHaveLength(400);
      expect(segment.text).toBe(text.slice(segment.start, segment.end));
    }
  });

  it("repeats the last overlap characters at the start of the next window", () => {
    const text = alphabetText(1000);
    const { segments } = chunkText(text, { size: 400, overlap: 50 });
    const [first, second] = segments;

    expect(second?.start).toBe(350);
    expect(second?.text.slice(0, 50)).toBe(first?.text.slice(350));
  });

  it("returns a single chunk for text shorter than the window", () => {
    const { segments } = chunkText("abc", { size: 400, overlap: 50 });
    expect(segments).toEqual([{ ordinal: 0, start: 0, end: 3, text: "abc" }]);
  });

  it("needs a second window for one character past the size", () => {
    const { segments } = chunkText(alphabetText(401), { size: 400, overlap: 50 });
    expect(segments.map((s) => [s.start, s.end])).toEqual([
      [0, 400],
      [350, 401],
    ]);
  });

  it("produces no chunks and a warning for empty text", () => {
    expect(chunkText("", { size: 400, overlap: 50 })).toEqual({
      segments: [],
      warnings: ["text is empty, no chunks produced"],
    });
  });

  it("rejects an overlap that is not smaller than the size", () => {
    expect(() => chunkText("abc", { size: 50, overlap: 50 })).toThrow(InvalidArgumentError);
    expect(() => chunkText("abc", { size: 0, overlap: 0 })).toThrow(InvalidArgumentError);
    expect(() => chunkText("abc", { size: 10, overlap: -1 })).toThrow(InvalidArgumentError);
  });

  it("is deterministic", () => {
    const text = alphabetText(2345);
    expect(chunkText(text, { size: 300, overlap: 20 })).toEqual(chunkText(text, { size: 300, overlap: 20 }));
  });
});

describe("chunking registry", () => {
  it("resolves the default fixed-window strategy", () => {
    expect(getChunkingStrategy("fixed-window").name).toBe("fixed-window");
  });

  it("throws for an unknown strategy", () => {
    expect(() => getChunkingStrategy("semantic")).toThrow("Unknown chunking strategy: semantic");
  });

  it("accepts registered strategies", () => {
    registerChunkingStrategy({
      name: "whole-text",
      chunk: (text) => ({ segments: [{ ordinal: 0, start: 0, end: text.length, text }], warnings: [] }),
    });
    const { segments } = getChunkingStrategy("whole-text").chunk("hello", { size: 1, overlap: 0 });
    expect(segments).toEqual([{ ordinal: 0, start: 0, end: 5, text: "hello" }]);
  });
});
