/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env via config.ts).
 * 2. Create the upstream embedding + generation clients.
 * 3. HTTP mode: start listening immediately so /health can report progress.
 * 4. Load the document, chunk it, embed every chunk and build the in-memory
 *    index. The finished service is published in a single assignment; until
 *    then /query and the MCP tools answer "still building".
 * 5. stdio mode: connect the MCP server once the index is ready.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DOCUMENT_PATH        Plain-text document to index (default RagDocument.txt).
 *  - CHUNK_SIZE           Max characters per chunk (default 200, cap 8000).
 *  - CHUNK_OVERLAP        Overlap characters between chunks (default 0).
 *  - TOP_K                Chunks retrieved per question (default 3, max 10).
 *  - SIMILARITY_METRIC    'cosine' (default) or 'l2'.
 *  - EMBEDDING_MODEL      Default text-embedding-3-small.
 *  - EMBEDDING_BATCH_SIZE Inputs per embedding request (default 64).
 *  - LLM_MODEL            Default gpt-4o.
 *  - OPENAI_API_KEY       API key for both models.
 *  - OPENAI_BASE_URL      Alternative OpenAI-compatible endpoint.
 *  - RAG_TRANSPORT        'http' (default) or 'stdio'.
 *  - HOST / PORT          HTTP bind address (default 127.0.0.1:8000).
 *  - REQUEST_TIMEOUT_MS   Per-request deadline for /query (default 60000).
 *  - CORS_ORIGIN          Access-Control-Allow-Origin for /query and /health (default *).
 *  - ALLOWED_HOSTS        Comma list of host[:port] accepted by /mcp.
 *  - VERBOSE              '1'/'true'/etc for per-chunk logging.
 */
import { getConfig } from "./config";
import { createProviders, createRagService } from "./providers";
import type { RagService } from "./rag";
import { createMcpServer } from "./server";
import { StatusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
const status = new StatusManager();
const providers = createProviders(config);

if (!config.openaiApiKey) {
  console.error("[RAG] OPENAI_API_KEY is not set; upstream calls will fail.");
}

// Published exactly once, after the index is complete.
let service: RagService | undefined;
const getService = () => service;

if (config.transport === "http") {
  status.markTransport("http");
  const allowedHosts = (
    process.env.ALLOWED_HOSTS ??
    ["127.0.0.1", "localhost", config.host]
      .flatMap((h) => [h, `${h}:${config.port}`])
      .join(",")
  )
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  await startHttpTransport(
    {
      getService,
      status,
      createMcpServer: () => createMcpServer(getService),
      hasApiKey: Boolean(config.openaiApiKey),
      requestTimeoutMs: config.requestTimeoutMs,
      corsOrigin: config.corsOrigin,
      allowedHosts,
    },
    { host: config.host, port: config.port },
  );
}

let built: RagService;
try {
  built = await createRagService(config, providers, status);
} catch (e) {
  console.error("[RAG] Failed to build the document index:", e);
  process.exit(1);
}
service = built;
status.markReady(built.index.dimension);
console.error("[RAG] Ready to answer questions.");

if (config.transport === "stdio") {
  status.markTransport("stdio");
  await startStdioTransport(() => createMcpServer(getService));
}
