import { z } from "zod";
import { VECTORIZE_CONFIG, modelDimensions, type EmbeddingModel } from "./config.js";
import { EmbeddingError, IoError, type EmbeddingErrorCode } from "./errors.js";
import type { EmbeddingBatch, EmbeddingClient, Tokenizer } from "./types.js";

export interface OpenAiEmbeddingClientOptions {
  apiKey: string;
  model?: EmbeddingModel;
  /** Base URL including the /v1 prefix. */
  baseUrl?: string;
  /** When set, every input is truncated to the model's max input tokens. */
  tokenizer?: Tokenizer;
  maxInputTokens?: number;
}

const EmbeddingResponseSchema = z.object({ data: z.array(z.unknown()) });

const EmbeddingItemSchema = z.object({
  index: z.number().int().optional(),
  embedding: z.array(z.number()),
});

export function classifyStatus(status: number): EmbeddingErrorCode {
  if (status === 401 || status === 403) return "auth_failed";
  if (status === 429) return "throttled";
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return "invalid_request";
  }
  if (status >= 500) return "server_error";
  return "unknown";
}

function toVector(values: number[], dimensions: number): Float32Array | null {
  return values.length === dimensions ? Float32Array.from(values) : null;
}

/**
 * Client for an OpenAI-compatible /embeddings endpoint. Does not retry:
 * every failure surfaces to the caller as `EmbeddingError` or `IoError`.
 */
export class OpenAiEmbeddingClient implements EmbeddingClient {
  readonly model: EmbeddingModel;
  readonly dimensions: number;

  private readonly apiKey: string;
  private readonly url: string;
  private readonly tokenizer: Tokenizer | undefined;
  private readonly maxInputTokens: number;

  constructor(options: OpenAiEmbeddingClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? VECTORIZE_CONFIG.embeddingModel;
    this.dimensions = modelDimensions(this.model);
    const baseUrl = (options.baseUrl ?? VECTORIZE_CONFIG.embeddingBaseUrl).replace(/\/+$/, "");
    this.url = `${baseUrl}/embeddings`;
    this.tokenizer = options.tokenizer;
    this.maxInputTokens = options.maxInputTokens ?? VECTORIZE_CONFIG.maxInputTokens;
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    if (texts.length === 0) return { embeddings: [], failures: 0 };

    const tokenizer = this.tokenizer;
    const input = tokenizer
      ? texts.map((text) => tokenizer.truncate(text, this.maxInputTokens))
      : texts;

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.model, input }),
      });
    } catch (error) {
      throw new IoError("fetch", this.url, error);
    }

    // A body that fails mid-stream is a transport failure, not a service answer.
    let body: string;
    try {
      body = await res.text();
    } catch (error) {
      throw new IoError("fetch", this.url, error);
    }

    if (!res.ok) {
      throw new EmbeddingError(
        classifyStatus(res.status),
        `Embedding API error (${res.status}): ${body}`,
        { status: res.status },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new EmbeddingError("invalid_response", "Embedding API returned malformed JSON", {
        status: res.status,
        cause: error,
      });
    }
    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingError("invalid_response", "Embedding API response has no data array", {
        status: res.status,
        cause: parsed.error,
      });
    }

    return this.align(parsed.data.data, texts.length);
  }

  /**
   * Places each returned item at its `index`. Slots the service left empty,
   * filled with something other than an embedding object, or filled with a
   * vector of the wrong size become zero vectors and count as failures, so
   * the batch always lines up with its input.
   */
  private align(data: unknown[], expected: number): EmbeddingBatch {
    const slots: Array<Float32Array | null> = new Array<Float32Array | null>(expected).fill(null);

    data.forEach((raw, position) => {
      const item = EmbeddingItemSchema.safeParse(raw);
      if (!item.success) return;
      const index = item.data.index ?? position;
      if (index < 0 || index >= expected) return;
      slots[index] = toVector(item.data.embedding, this.dimensions);
    });

    let failures = 0;
    const embeddings = slots.map((slot) => {
      if (slot) return slot;
      failures++;
      return new Float32Array(this.dimensions);
    });
    return { embeddings, failures };
  }
}
