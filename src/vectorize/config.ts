import { z } from "zod";
import { ConfigError } from "./errors.js";

export const EMBEDDING_MODELS = {
  "text-embedding-ada-002": { dimensions: 1536 },
  "text-embedding-3-small": { dimensions: 1536 },
  "text-embedding-3-large": { dimensions: 3072 },
} as const;

export type EmbeddingModel = keyof typeof EMBEDDING_MODELS;

export const VECTORIZE_CONFIG = {
  embeddingModel: "text-embedding-ada-002",
  embeddingBaseUrl: "https://api.openai.com/v1",
  maxInputTokens: 8191,

  tokenLimit: 1_000_000,
  concurrency: 10,

  stagingDirName: ".staging",
  vectorsFileName: "vectors",
  progressFileName: "progress",
} as const;

export function isEmbeddingModel(name: string): name is EmbeddingModel {
  return Object.prototype.hasOwnProperty.call(EMBEDDING_MODELS, name);
}

export function modelDimensions(model: EmbeddingModel): number {
  return EMBEDDING_MODELS[model].dimensions;
}

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  EMBEDDING_MODEL: z
    .string()
    .refine(isEmbeddingModel, { message: "unknown embedding model" })
    .default(VECTORIZE_CONFIG.embeddingModel),
  EMBEDDING_BASE_URL: z.string().url().default(VECTORIZE_CONFIG.embeddingBaseUrl),
  VECTORIZE_TOKEN_LIMIT: positiveInt.default(VECTORIZE_CONFIG.tokenLimit),
  VECTORIZE_CONCURRENCY: positiveInt.default(VECTORIZE_CONFIG.concurrency),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export interface EnvConfig {
  apiKey: string;
  model: EmbeddingModel;
  baseUrl: string;
  tokenLimit: number;
  concurrency: number;
  logLevel: "error" | "warn" | "info" | "debug";
}

export function loadEnvConfig(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(
      `Invalid configuration (${keys.join(", ")}): ${parsed.error.issues
        .map((issue) => issue.message)
        .join("; ")}`,
      keys,
    );
  }

  const data = parsed.data;
  return {
    apiKey: data.OPENAI_API_KEY,
    model: data.EMBEDDING_MODEL,
    baseUrl: data.EMBEDDING_BASE_URL,
    tokenLimit: data.VECTORIZE_TOKEN_LIMIT,
    concurrency: data.VECTORIZE_CONCURRENCY,
    logLevel: data.LOG_LEVEL,
  };
}
