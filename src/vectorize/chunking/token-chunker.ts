import { VECTORIZE_CONFIG } from "../config.js";
import type { Tokenizer } from "../types.js";

/**
 * Groups text items into chunks whose summed token count stays within
 * `limit`. Items are never split or truncated here: an item larger than the
 * limit becomes a chunk of its own.
 */
export class TokenChunker {
  constructor(
    private readonly tokenizer: Tokenizer,
    readonly limit: number = VECTORIZE_CONFIG.tokenLimit,
  ) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Token limit must be a positive integer, got ${limit}`);
    }
  }

  async *chunk(items: AsyncIterable<string>): AsyncGenerator<string[]> {
    let pending: string[] = [];
    let pendingTokens = 0;

    for await (const item of items) {
      const tokens = this.tokenizer.countTokens(item);
      if (pending.length > 0 && pendingTokens + tokens > this.limit) {
        yield pending;
        pending = [item];
        pendingTokens = tokens;
      } else {
        pending.push(item);
        pendingTokens += tokens;
      }
    }

    if (pending.length > 0) {
      yield pending;
    }
  }
}
