import dotenv from "dotenv";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    console.error(`❌ Missing required environment variable: ${key}`);
    console.error(`   Copy .env.example to .env and fill in your values.`);
    process.exit(1);
  }
  return value;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(process.env[key] || "", 10);
  return isNaN(parsed) ? fallback : parsed;
}

function floatEnv(key: string, fallback: number): number {
  const parsed = parseFloat(process.env[key] || "");
  return isNaN(parsed) ? fallback : parsed;
}

function parseBackend(value: string | undefined): "pinecone" | "memory" {
  return value === "memory" ? "memory" : "pinecone";
}

// ── Config ───────────────────────────────────────────────

export const config = {
  // Language model (any OpenAI-compatible endpoint)
  openAiApiKey: process.env.OPENAI_API_KEY || "",
  openAiBaseUrl: process.env.OPENAI_BASE_URL || "https://api.openai.com/v1",
  llmModel: process.env.LLM_MODEL || "gpt-4o-mini",
  extractionModel:
    process.env.EXTRACTION_MODEL || process.env.LLM_MODEL || "gpt-4o-mini",
  llmTemperature: floatEnv("LLM_TEMPERATURE", 0.7),
  llmMaxTokens: intEnv("LLM_MAX_TOKENS", 2048),
  modelStreamTimeoutMs: intEnv("MODEL_STREAM_TIMEOUT_MS", 60_000),

  // ── Embeddings + vector store ─────────────────────────
  pineconeApiKey: process.env.PINECONE_API_KEY || "",
  pineconeIndex: process.env.PINECONE_INDEX || "",
  embeddingModel: process.env.EMBEDDING_MODEL || "multilingual-e5-large",
  embeddingDimension: intEnv("EMBEDDING_DIMENSION", 1024),
  embeddingTimeoutMs: intEnv("EMBEDDING_TIMEOUT_MS", 5_000),

  // ── Storage ───────────────────────────────────────────
  storeBackend: parseBackend(process.env.STORE_BACKEND),
  directoryPath: process.env.DIRECTORY_PATH || "data/directory.json",
  memoryExtraction: process.env.MEMORY_EXTRACTION !== "false",

  // ── Server ────────────────────────────────────────────
  port: intEnv("PORT", 3100),
} as const;

// ── Validation ───────────────────────────────────────────

/**
 * Exit early when a secret the running server needs is missing.
 * Called from main() rather than at import so tests can load any module.
 */
export function assertRuntimeConfig(): void {
  requireEnv("OPENAI_API_KEY");
  requireEnv("PINECONE_API_KEY");
  if (config.storeBackend === "pinecone") {
    requireEnv("PINECONE_INDEX");
  }
  if (config.embeddingDimension <= 0) {
    console.error("❌ EMBEDDING_DIMENSION must be a positive integer.");
    process.exit(1);
  }
}
