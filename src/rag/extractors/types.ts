import type { DocumentFormat, ExtractedText } from "../types.js";

export interface Extractor {
  readonly name: string;
  readonly formats: readonly DocumentFormat[];
  extract(filePath: string, format: DocumentFormat, signal?: AbortSignal): Promise<ExtractedText>;
}
