import { z } from "zod";
import type { RagConfig } from "./config.js";
import { GenerationUnavailableError, RunCancelledError, errorMessage } from "./errors.js";
import { withTimeout } from "./retry.js";
import type { GroundedRequest } from "./types.js";

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

export interface GenerationService {
  generate(request: GroundedRequest, signal?: AbortSignal): Promise<string>;
  /** Free-form completion, used for document enrichment. */
  complete(system: string, prompt: string, signal?: AbortSignal): Promise<string>;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

interface ApiMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export class OpenRouterGenerationService implements GenerationService {
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    config: Pick<RagConfig, "generationModel" | "requestTimeoutMs">,
    private readonly url: string = OPENROUTER_API_URL,
  ) {
    this.model = config.generationModel;
    this.timeoutMs = config.requestTimeoutMs;
  }

  generate(request: GroundedRequest, signal?: AbortSignal): Promise<string> {
    return this.chat(
      [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      signal,
    );
  }

  complete(system: string, prompt: string, signal?: AbortSignal): Promise<string> {
    return this.chat(
      [
        { role: "system", content: system },
        { role: "user", content: prompt },
      ],
      signal,
    );
  }

  /** Any failure on the way surfaces as GenerationUnavailableError. */
  private async chat(messages: ApiMessage[], signal?: AbortSignal): Promise<string> {
    try {
      return await withTimeout(
        "generation request",
        this.timeoutMs,
        async (timeoutSignal) => {
          const res = await fetch(this.url, {
            method: "POST",
            headers: {
              Authorization: `Bearer ${this.apiKey}`,
              "Content-Type": "application/json",
            },
            body: JSON.stringify({ model: this.model, messages }),
            signal: timeoutSignal,
          });

          if (!res.ok) {
            const text = await res.text();
            throw new GenerationUnavailableError(`API error (${res.status}): ${text}`);
          }

          const parsed = CompletionSchema.safeParse(await res.json());
          if (!parsed.success) {
            throw new GenerationUnavailableError(`Unexpected completion payload: ${parsed.error.message}`);
          }
          const content = parsed.data.choices[0]?.message.content?.trim();
          if (!content) throw new GenerationUnavailableError("Model returned an empty answer");
          return content;
        },
        signal,
      );
    } catch (err) {
      if (err instanceof GenerationUnavailableError) throw err;
      if (err instanceof RunCancelledError) throw err;
      throw new GenerationUnavailableError(`Generation failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
