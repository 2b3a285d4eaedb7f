import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { EmbeddingError } from "../errors.js";
import type { EmbeddingBatch, EmbeddingClient, Operation, Tokenizer } from "../types.js";

/** One token per whitespace-separated word. */
export class WordTokenizer implements Tokenizer {
  countTokens(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
  }

  truncate(text: string, maxTokens: number): string {
    return text.split(/\s+/).filter(Boolean).slice(0, maxTokens).join(" ");
  }
}

/** Embeds "abc" as [97, 3]: first code point and length. */
export function fakeVector(text: string): Float32Array {
  return Float32Array.from([text.codePointAt(0) ?? 0, text.length]);
}

export interface FakeClientOptions {
  failOn?: string;
  delayMs?: (texts: string[]) => number;
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly dimensions = 2;
  readonly calls: string[][] = [];

  constructor(private readonly options: FakeClientOptions = {}) {}

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    this.calls.push(texts);
    const delay = this.options.delayMs?.(texts) ?? 0;
    if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
    if (this.options.failOn !== undefined && texts.includes(this.options.failOn)) {
      throw new EmbeddingError("server_error", `refused ${this.options.failOn}`, { status: 500 });
    }
    return { embeddings: texts.map(fakeVector), failures: 0 };
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "oplog-vectorizer-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeOperations(filePath: string, operations: Operation[]): Promise<void> {
  await writeFile(filePath, operations.map((op) => JSON.stringify(op) + "\n").join(""));
}

export function inserted(id: string, text: string): Operation {
  return { op: "Inserted", id, string: text };
}

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

export async function collect<T>(
  items: AsyncIterable<T>,
): Promise<{ values: T[]; error: unknown }> {
  const values: T[] = [];
  try {
    for await (const item of items) values.push(item);
  } catch (error) {
    return { values, error };
  }
  return { values, error: undefined };
}
