import { z } from "zod";
import type { RagConfig } from "./config.js";
import { InvalidInputError, RunCancelledError, ServiceUnavailableError, errorMessage } from "./errors.js";
import { withRetry, withTimeout } from "./retry.js";
import { mapWithConcurrency } from "./worker-pool.js";
import type { Log } from "./types.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

export interface EmbeddingService {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

/** Map an HTTP failure to the gateway's error taxonomy. */
export function embeddingHttpError(status: number, body: string): Error {
  const message = `Embedding API error (${status}): ${body}`;
  if (status === 400 || status === 413 || status === 422) {
    return new InvalidInputError(message);
  }
  return new ServiceUnavailableError(message);
}

export class OpenRouterEmbeddingService implements EmbeddingService {
  readonly model: string;
  readonly dimensions: number;

  constructor(
    private readonly apiKey: string,
    config: Pick<RagConfig, "embeddingModel" | "embeddingDimensions">,
    private readonly url: string = OPENROUTER_EMBEDDINGS_URL,
  ) {
    this.model = config.embeddingModel;
    this.dimensions = config.embeddingDimensions;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.model, input: [text] }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ServiceUnavailableError(`Embedding API unreachable: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const body = await res.text();
      throw embeddingHttpError(res.status, body);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ServiceUnavailableError(`Embedding API returned an unexpected payload: ${parsed.error.message}`);
    }
    const [first] = parsed.data.data;
    if (!first) throw new ServiceUnavailableError("Embedding API returned no vectors");
    return first.embedding;
  }
}

export interface EmbedCallOptions {
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  signal?: AbortSignal;
  log?: Log;
}

export function embedCallOptions(
  config: Pick<RagConfig, "requestTimeoutMs" | "maxAttempts" | "retryBaseDelayMs">,
  extra: { signal?: AbortSignal; log?: Log } = {},
): EmbedCallOptions {
  return {
    timeoutMs: config.requestTimeoutMs,
    maxAttempts: config.maxAttempts,
    retryBaseDelayMs: config.retryBaseDelayMs,
    ...extra,
  };
}

/** One gateway call with a per-attempt timeout and bounded retries. */
export function embedWithRetry(
  service: EmbeddingService,
  text: string,
  options: EmbedCallOptions,
): Promise<number[]> {
  return withRetry(
    () => withTimeout("embedding request", options.timeoutMs, (signal) => service.embed(text, signal), options.signal),
    {
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.retryBaseDelayMs,
      signal: options.signal,
      onRetry: (attempt, err) => options.log?.(`RAG: embedding attempt ${attempt} failed (${errorMessage(err)}), retrying`),
    },
  );
}

/**
 * Embed every chunk of one document. Resolves only when all vectors are in
 * hand; any exhausted failure rejects the whole batch.
 */
export async function embedTexts(
  service: EmbeddingService,
  texts: readonly string[],
  options: EmbedCallOptions & { concurrency: number; onProgress?: (done: number, total: number) => void },
): Promise<number[][]> {
  const results = await mapWithConcurrency(texts, (text) => embedWithRetry(service, text, options), {
    concurrency: options.concurrency,
    signal: options.signal,
    onProgress: options.onProgress,
  });

  const vectors: number[][] = [];
  for (const r of results) {
    if (r.status !== "done") throw new RunCancelledError("Embedding cancelled before all chunks were embedded");
    vectors.push(r.value);
  }
  return vectors;
}

export function embedQuery(
  service: EmbeddingService,
  query: string,
  config: Pick<RagConfig, "queryPrefix" | "requestTimeoutMs" | "maxAttempts" | "retryBaseDelayMs">,
  signal?: AbortSignal,
): Promise<number[]> {
  return embedWithRetry(service, config.queryPrefix + query, embedCallOptions(config, { signal }));
}
