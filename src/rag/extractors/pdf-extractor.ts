import { readFile } from "node:fs/promises";
import { extractText, getDocumentProxy } from "unpdf";
import type { ExtractedText } from "../types.js";
import type { Extractor } from "./types.js";

export function pageMarker(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

export async function extractPdf(filePath: string): Promise<ExtractedText> {
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));
  const { totalPages, text } = await extractText(pdf, { mergePages: false });
  const pages = Array.isArray(text) ? text : [text];

  const parts = pages.map((pageText, i) => `\n${pageMarker(i + 1)}\n${pageText}`);
  return { text: parts.join(""), pageCount: totalPages };
}

export const pdfExtractor: Extractor = {
  name: "unpdf",
  formats: ["pdf"],
  extract: (filePath) => extractPdf(filePath),
};
