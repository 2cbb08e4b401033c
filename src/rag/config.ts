import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const RAG_CONFIG = {
  seedUrls: [
    "https://versebyverseministry.org/bible-studies/category/old-testament-books?category=old-testament-books",
    "https://versebyverseministry.org/bible-studies/category/new-testament-books?category=new-testament-books",
  ],
  userAgent: "Mozilla/5.0 (compatible; pdf-study-rag/0.1)",

  manifestFile: "manifest.json",
  indexFile: "index.json",

  embeddingBatchSize: 100,
  embeddingConcurrency: 4,

  downloadConcurrency: 2,
  politenessDelayMs: 500,
  requestTimeoutMs: 60_000,

  chatTemperature: 0,
  defaultChunkingStrategy: "recursive-character",
} as const;

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1/";

const envSchema = z
  .object({
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_BASE_URL: z.string().url().default(DEFAULT_OPENAI_BASE_URL),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    CHAT_MODEL: z.string().min(1).default("gpt-4o-mini"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    RETRIEVAL_K: z.coerce.number().int().positive().default(4),
    DATA_DIR: z.string().min(1).default("data"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    LOG_PRETTY: z
      .enum(["true", "false", "1", "0"])
      .default("false")
      .transform((v) => v === "true" || v === "1"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export interface Settings {
  openaiApiKey: string;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  pdfDir: string;
  manifestPath: string;
  indexDir: string;
  logLevel: string;
  logPretty: boolean;
}

/** Blank variables count as unset so `.env` templates with `KEY=` fall back to defaults. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  if (!values.OPENAI_API_KEY) {
    throw new ConfigurationError(
      "OPENAI_API_KEY environment variable is required.",
      "Create a .env file with OPENAI_API_KEY=your-key, or export OPENAI_API_KEY before running.",
    );
  }

  const dataDir = path.resolve(values.DATA_DIR);
  const pdfDir = path.join(dataDir, "pdfs");
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    embeddingModel: values.EMBEDDING_MODEL,
    chatModel: values.CHAT_MODEL,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    retrievalK: values.RETRIEVAL_K,
    pdfDir,
    manifestPath: path.join(pdfDir, RAG_CONFIG.manifestFile),
    indexDir: path.join(dataDir, "vector-index"),
    logLevel: values.LOG_LEVEL,
    logPretty: values.LOG_PRETTY,
  };
}
