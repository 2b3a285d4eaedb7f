import { VECTORIZE_CONFIG } from "./config.js";
import { Checkpoint } from "./checkpoint.js";
import { TokenChunker } from "./chunking/index.js";
import { EmbeddingError } from "./errors.js";
import { readTextItems, skipItems } from "./operation-source.js";
import { OrderedScheduler } from "./scheduler.js";
import { prepareStaging } from "./staging.js";
import { VectorStore } from "./vector-store.js";
import type { EmbeddingBatch, EmbeddingClient, Tokenizer, VectorizeResult } from "./types.js";

export interface VectorizeOptions {
  source: AsyncIterable<string>;
  store: VectorStore;
  checkpoint: Checkpoint;
  client: EmbeddingClient;
  tokenizer: Tokenizer;
  tokenLimit?: number;
  concurrency?: number;
  log?: (msg: string) => void;
}

export interface IndexFromFileOptions {
  operationsPath: string;
  /** Directory holding `.staging/<domain>/`. */
  root: string;
  domain: string;
  client: EmbeddingClient;
  tokenizer: Tokenizer;
  tokenLimit?: number;
  concurrency?: number;
  log?: (msg: string) => void;
}

const noop = (): void => {};

async function embedChunk(client: EmbeddingClient, chunk: string[]): Promise<EmbeddingBatch> {
  const batch = await client.embed(chunk);
  if (batch.embeddings.length !== chunk.length) {
    throw new EmbeddingError(
      "misaligned_batch",
      `Embedding client returned ${batch.embeddings.length} embeddings for ${chunk.length} inputs`,
    );
  }
  return batch;
}

/**
 * Embeds every item after the checkpoint's cursor and appends the vectors to
 * the store. Each batch is synced to the vector file, then the cursor is
 * synced, before the next result is taken.
 */
export async function vectorizeOperations(options: VectorizeOptions): Promise<VectorizeResult> {
  const { store, checkpoint, client } = options;
  const log = options.log ?? noop;

  if (client.dimensions !== store.dimensions) {
    throw new RangeError(
      `Embedding client produces ${client.dimensions} dimensions but the store holds ${store.dimensions}`,
    );
  }

  const chunker = new TokenChunker(options.tokenizer, options.tokenLimit ?? VECTORIZE_CONFIG.tokenLimit);
  const scheduler = new OrderedScheduler(
    (chunk: string[]) => embedChunk(client, chunk),
    options.concurrency ?? VECTORIZE_CONFIG.concurrency,
  );

  const remaining = skipItems(options.source, checkpoint.cursor);
  let failures = 0;

  log(`vectorize: starting at ${checkpoint.cursor}`);
  for await (const batch of scheduler.schedule(chunker.chunk(remaining))) {
    await store.write(checkpoint.cursor, batch.embeddings);
    await checkpoint.advance(batch.embeddings.length);
    failures += batch.failures;
    log(
      `vectorize: indexed ${checkpoint.cursor} (+${batch.embeddings.length}` +
        (batch.failures > 0 ? `, ${batch.failures} failed` : "") +
        ")",
    );
  }

  log(`vectorize: done, ${checkpoint.cursor} embedding(s), ${failures} failure(s)`);
  return { failures, indexed: checkpoint.cursor };
}

/** Runs a resumable vectorization of one operations file into the domain's staging directory. */
export async function indexFromOperationsFile(
  options: IndexFromFileOptions,
): Promise<VectorizeResult> {
  const log = options.log ?? noop;
  const paths = await prepareStaging(options.root, options.domain);
  log(`vectorize: staging ${paths.dir}`);

  const store = await VectorStore.open(paths.vectors, options.client.dimensions);
  try {
    const checkpoint = await Checkpoint.open(paths.progress);
    try {
      return await vectorizeOperations({
        source: readTextItems(options.operationsPath),
        store,
        checkpoint,
        client: options.client,
        tokenizer: options.tokenizer,
        tokenLimit: options.tokenLimit,
        concurrency: options.concurrency,
        log,
      });
    } finally {
      await checkpoint.close();
    }
  } finally {
    await store.close();
  }
}
