import { readFile } from "node:fs/promises";
import type { Extractor } from "./types.js";

export const textExtractor: Extractor = {
  name: "plain-text",
  formats: ["text"],
  async extract(filePath, _format, signal) {
    const text = await readFile(filePath, { encoding: "utf-8", signal });
    return { text, pageCount: 1 };
  },
};
