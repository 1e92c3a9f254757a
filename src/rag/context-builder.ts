import { chunkId } from "./types.js";
import type { ContextBlock, GroundedRequest, RetrievalResult } from "./types.js";

export const NO_ANSWER =
  "Based on the provided context, there is no information available to answer this question.";

export const NO_CONTEXT_MARKER = "No relevant context was found for this question.";

const SYSTEM_PROMPT =
  "You answer questions about a document collection using ONLY the context excerpts supplied in the user message. " +
  "Every sentence of your answer must end with the [Source: document, Chunk N] label of the excerpt it comes from. " +
  "Do not add facts, names or figures that are not stated in the excerpts. " +
  `If the excerpts do not contain the answer, or no context is supplied, reply with exactly: "${NO_ANSWER}"`;

export function citationLabel(documentId: string, ordinal: number): string {
  return `[Source: ${documentId}, Chunk ${ordinal}]`;
}

/**
 * The single point where generation context is built. The context is exactly
 * the retrieved chunks, verbatim, each under its citation label; nothing else
 * is ever added to it.
 */
export function assemblePrompt(question: string, result: RetrievalResult): GroundedRequest {
  const context: ContextBlock[] = result.map(({ chunk, score }) => ({
    citation: citationLabel(chunk.documentId, chunk.ordinal),
    chunkId: chunkId(chunk.documentId, chunk.ordinal),
    documentId: chunk.documentId,
    ordinal: chunk.ordinal,
    score,
    text: chunk.text,
  }));

  const contextless = context.length === 0;
  const contextSection = contextless
    ? NO_CONTEXT_MARKER
    : context.map((block) => `${block.citation}\n${block.text}`).join("\n\n");

  const user =
    "--- Retrieved Context ---\n" +
    contextSection +
    "\n--- End of Context ---\n\n" +
    `Question: ${question}`;

  return {
    question,
    system: SYSTEM_PROMPT,
    user,
    context,
    citations: context.map((block) => block.chunkId),
    contextless,
  };
}

/** "a.pdf #0, #2 | b.txt #1": one entry per source, ordinals in rank order. */
export function formatSources(result: RetrievalResult): string {
  const byDocument = new Map<string, number[]>();
  for (const { chunk } of result) {
    const ordinals = byDocument.get(chunk.documentId);
    if (ordinals) ordinals.push(chunk.ordinal);
    else byDocument.set(chunk.documentId, [chunk.ordinal]);
  }
  return [...byDocument]
    .map(([documentId, ordinals]) => `${documentId} ${ordinals.map((o) => `#${o}`).join(", ")}`)
    .join(" | ");
}
