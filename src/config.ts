import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { SimilarityMetric } from "./types";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// Centralized single dotenv.config() call. Prefer the project-root .env so
// running from another working directory still picks it up.
(() => {
  const rootEnv = path.resolve(moduleDir, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = (() => {
  try {
    const pkg: unknown = JSON.parse(
      fsSync.readFileSync(path.resolve(moduleDir, "../package.json"), "utf8"),
    );
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (e) {
    console.error("[RAG] Could not read package.json version:", e);
  }
  return "0.0.0";
})();

export type TransportMode = "http" | "stdio";

export interface Config {
  documentPath: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  metric: SimilarityMetric;
  embeddingModel: string;
  embeddingBatchSize: number;
  llmModel: string;
  openaiApiKey: string | undefined;
  openaiBaseUrl: string | undefined;
  transport: TransportMode;
  host: string;
  port: number;
  requestTimeoutMs: number;
  corsOrigin: string;
  verbose: boolean;
}

/** Upper bound for `top_k` / `max_results` requests. */
export const MAX_TOP_K = 10;

/** Parse an integer env value, falling back when missing or out of range. */
function intFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n)) return fallback;
  const i = Math.floor(n);
  return i < min ? fallback : Math.min(max, i);
}

/**
 * Resolve runtime configuration from environment variables. Every knob has
 * a default; malformed values fall back to it rather than failing startup.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const documentPath = env.DOCUMENT_PATH?.trim() || "RagDocument.txt";

  // Chunk size impacts recall (too large) vs. precision (too small).
  const chunkSize = intFrom(env.CHUNK_SIZE, 200, 1, 8000);
  let chunkOverlap = intFrom(env.CHUNK_OVERLAP, 0, 0, 4000);
  if (chunkOverlap >= chunkSize) {
    console.error(
      `[RAG] CHUNK_OVERLAP (=${chunkOverlap}) >= CHUNK_SIZE (=${chunkSize}). Using overlap 0.`,
    );
    chunkOverlap = 0;
  }

  const topK = intFrom(env.TOP_K, 3, 1, MAX_TOP_K);

  const metric: SimilarityMetric =
    env.SIMILARITY_METRIC?.trim().toLowerCase() === "l2" ? "l2" : "cosine";

  const transport: TransportMode =
    env.RAG_TRANSPORT?.trim().toLowerCase() === "stdio" ? "stdio" : "http";

  // Tolerant truthy parsing (supports several common forms).
  const verbose = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  return {
    documentPath,
    chunkSize,
    chunkOverlap,
    topK,
    metric,
    embeddingModel: env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
    embeddingBatchSize: intFrom(env.EMBEDDING_BATCH_SIZE, 64, 1, 2048),
    llmModel: env.LLM_MODEL?.trim() || "gpt-4o",
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    openaiBaseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    transport,
    host: env.HOST?.trim() || "127.0.0.1",
    port: intFrom(env.PORT, 8000, 0, 65535),
    requestTimeoutMs: intFrom(env.REQUEST_TIMEOUT_MS, 60000, 1, 600000),
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    verbose,
  };
}
