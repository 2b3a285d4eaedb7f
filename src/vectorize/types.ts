export type Operation =
  | { op: "Inserted"; id: string; string: string }
  | { op: "Changed"; id: string; string: string }
  | { op: "Deleted"; id: string }
  | { op: "Error"; message: string };

export type Embedding = Float32Array;

export interface EmbeddingBatch {
  /** Positionally aligned to the input texts. */
  embeddings: Embedding[];
  /** Items the service could not embed; their slots hold zero vectors. */
  failures: number;
}

export interface EmbeddingClient {
  readonly dimensions: number;
  embed(texts: string[]): Promise<EmbeddingBatch>;
}

export interface Tokenizer {
  countTokens(text: string): number;
  truncate(text: string, maxTokens: number): string;
}

export interface StagingPaths {
  dir: string;
  vectors: string;
  progress: string;
}

export interface VectorizeResult {
  /** Total failures reported by the embedding client across all batches. */
  failures: number;
  /** Cursor after the run: embeddings durably stored. */
  indexed: number;
}
