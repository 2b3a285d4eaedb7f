export { TokenChunker } from "./token-chunker.js";
export { TiktokenTokenizer } from "./tokenizer.js";
