import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { VECTORIZE_CONFIG } from "../config.js";
import type { Tokenizer } from "../types.js";

/**
 * Counts tokens the way the embedding service sees them. Inputs longer than
 * `maxInputTokens` are truncated by the client before sending, so the count
 * is capped at that value.
 */
export class TiktokenTokenizer implements Tokenizer {
  private readonly encoding: Tiktoken;

  constructor(
    encodingName: TiktokenEncoding = "cl100k_base",
    private readonly maxInputTokens: number = VECTORIZE_CONFIG.maxInputTokens,
  ) {
    this.encoding = getEncoding(encodingName);
  }

  countTokens(text: string): number {
    return Math.min(this.encoding.encode(text).length, this.maxInputTokens);
  }

  truncate(text: string, maxTokens: number): string {
    const tokens = this.encoding.encode(text);
    if (tokens.length <= maxTokens) return text;
    return this.encoding.decode(tokens.slice(0, maxTokens));
  }
}
