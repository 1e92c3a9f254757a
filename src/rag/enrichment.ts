import { z } from "zod";
import type { GenerationService } from "./generation-service.js";
import type { Enrichment } from "./types.js";

const MIN_ENRICHABLE_CHARS = 30;

const ENRICHMENT_SYSTEM = "You are a document analyst. Respond with a single JSON object and nothing else.";

const ENRICHMENT_PROMPT =
  "Return a JSON object with:\n" +
  '1. "summary": a concise 4-5 sentence summary.\n' +
  '2. "tags": up to 5 short semantic tags.\n' +
  '3. "classification": a document type label (e.g. "Guideline", "Meeting Outcome", "Cost Table").\n\n' +
  "Document:\n";

const EnrichmentSchema = z.object({
  summary: z.string(),
  tags: z.array(z.string()).transform((tags) => tags.map((t) => t.trim()).filter(Boolean).slice(0, 5)),
  classification: z.string(),
});

export const EMPTY_ENRICHMENT: Enrichment = { summary: "", tags: [], classification: "n/a" };

/** Models often wrap JSON in a ```json fence. */
function stripFence(raw: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(raw.trim());
  return fenced?.[1] ?? raw.trim();
}

export function parseEnrichment(raw: string): Enrichment {
  let json: unknown;
  try {
    json = JSON.parse(stripFence(raw));
  } catch {
    return { summary: raw.trim(), tags: [], classification: "manual_review_required" };
  }
  const parsed = EnrichmentSchema.safeParse(json);
  if (!parsed.success) {
    return { summary: raw.trim(), tags: [], classification: "manual_review_required" };
  }
  return parsed.data;
}

/** Summary, tags and classification for a document's canonical text. */
export async function enrichDocument(
  generation: GenerationService,
  canonicalText: string,
  maxChars: number,
  signal?: AbortSignal,
): Promise<Enrichment> {
  if (canonicalText.trim().length < MIN_ENRICHABLE_CHARS) {
    return { ...EMPTY_ENRICHMENT, tags: [] };
  }
  const raw = await generation.complete(ENRICHMENT_SYSTEM, ENRICHMENT_PROMPT + canonicalText.slice(0, maxChars), signal);
  return parseEnrichment(raw);
}
