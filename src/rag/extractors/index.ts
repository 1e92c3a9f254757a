import { ExtractionError, RagError, UnsupportedFormatError, errorMessage } from "../errors.js";
import type { DocumentFormat, ExtractedText } from "../types.js";
import { pdfExtractor } from "./pdf-extractor.js";
import { textExtractor } from "./text-extractor.js";
import type { Extractor } from "./types.js";

const registry = new Map<DocumentFormat, Extractor>();

/** Register (or replace) the converter used for each of `extractor.formats`. */
export function registerExtractor(extractor: Extractor): void {
  for (const format of extractor.formats) {
    registry.set(format, extractor);
  }
}

export function unregisterExtractor(format: DocumentFormat): void {
  registry.delete(format);
}

export function getExtractor(format: DocumentFormat): Extractor {
  const extractor = registry.get(format);
  if (!extractor) {
    throw new UnsupportedFormatError(format);
  }
  return extractor;
}

/**
 * Run the registered converter for `format`. Anything other than a
 * cancellation surfaces as an ExtractionError.
 */
export async function extract(
  filePath: string,
  format: DocumentFormat,
  signal?: AbortSignal,
): Promise<ExtractedText> {
  const extractor = getExtractor(format);
  try {
    return await extractor.extract(filePath, format, signal);
  } catch (err) {
    if (err instanceof RagError) throw err;
    if (signal?.aborted) throw err;
    throw new ExtractionError(`${extractor.name} failed on ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

// Register defaults. DOCX and image OCR converters are supplied by the host.
registerExtractor(pdfExtractor);
registerExtractor(textExtractor);

export { pdfExtractor, pageMarker } from "./pdf-extractor.js";
export { textExtractor } from "./text-extractor.js";
export type { Extractor } from "./types.js";
