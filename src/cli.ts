import type winston from "winston";
import { loadEnvConfig, type EnvConfig } from "./vectorize/config.js";
import { TiktokenTokenizer } from "./vectorize/chunking/index.js";
import { OpenAiEmbeddingClient } from "./vectorize/embedding-service.js";
import { VectorizationError } from "./vectorize/errors.js";
import { indexFromOperationsFile } from "./vectorize/pipeline.js";
import { createLogger } from "./logger.js";

export const USAGE = "Usage: oplog-vectorize <operations-file> <vectorlink-dir> <domain>";

function logFailure(logger: winston.Logger, err: unknown, meta: Record<string, string>): void {
  const code = err instanceof VectorizationError ? err.code : "unknown";
  const msg = err instanceof Error ? err.message : String(err);
  logger.error(msg, { ...meta, code });
}

/** Runs one vectorization and returns the process exit status. */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  logger: winston.Logger = createLogger(),
): Promise<number> {
  const [operationsPath, root, domain] = argv;
  if (!operationsPath || !root || !domain) {
    console.error(USAGE);
    return 2;
  }

  let config: EnvConfig;
  try {
    config = loadEnvConfig(env);
  } catch (err: unknown) {
    logFailure(logger, err, { domain });
    return 1;
  }
  logger.level = config.logLevel;

  const tokenizer = new TiktokenTokenizer();
  const client = new OpenAiEmbeddingClient({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    tokenizer,
  });

  try {
    const result = await indexFromOperationsFile({
      operationsPath,
      root,
      domain,
      client,
      tokenizer,
      tokenLimit: config.tokenLimit,
      concurrency: config.concurrency,
      log: (msg) => logger.info(msg),
    });
    logger.info("vectorization complete", { domain, ...result });
    return 0;
  } catch (err: unknown) {
    logFailure(logger, err, { domain });
    return 1;
  }
}
