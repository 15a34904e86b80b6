import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Server as HttpServer } from "node:http";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { Answerer, DEFAULT_NOT_FOUND_MESSAGE } from "../answerer";
import { GenerationError } from "../errors";
import type { TextGenerator } from "../generation";
import { buildRagService, type RagService } from "../rag";
import { createMcpServer } from "../server";
import { StatusManager } from "../status";
import {
  AUDIT_DOCUMENT,
  AUDIT_VOCABULARY,
  KeywordEmbedder,
  ScriptedGenerator,
} from "../testing/stubs";
import { createHttpApp, type HttpDeps } from "./http";

let listener: HttpServer | undefined;
let service: RagService | undefined;

function build(generator: TextGenerator, text = AUDIT_DOCUMENT): Promise<RagService> {
  return buildRagService({
    document: { path: "audit.txt", text },
    embedder: new KeywordEmbedder(AUDIT_VOCABULARY),
    answerer: new Answerer(generator),
    chunkSize: 40,
  });
}

async function serve(overrides: Partial<HttpDeps> = {}): Promise<string> {
  const getService = () => service;
  const app = createHttpApp({
    getService,
    status: new StatusManager({ version: "9.9.9", documentPath: "audit.txt" }),
    createMcpServer: () => createMcpServer(getService),
    hasApiKey: true,
    requestTimeoutMs: 5000,
    ...overrides,
  });
  const server = await new Promise<HttpServer>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  listener = server;
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  return `http://127.0.0.1:${address.port}`;
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  const server = listener;
  listener = undefined;
  service = undefined;
  if (!server) return;
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("POST /query", () => {
  it("answers with sources and a request id", async () => {
    service = await build(ScriptedGenerator.replying("It checks store compliance."));
    const base = await serve();

    const res = await postJson(`${base}/query`, {
      question: "What does it check?",
      max_results: 1,
    });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({
      answer: "It checks store compliance.",
      found: true,
      sources: [
        {
          index: 0,
          text: "Shopify Audit checks store compliance. ",
          score: expect.closeTo(0.57735, 4),
        },
      ],
      request_id: expect.stringMatching(/^[0-9a-f-]{36}$/),
    });
  });

  it("uses the service default when max_results is omitted", async () => {
    service = await build(ScriptedGenerator.replying("ok"));
    const base = await serve();

    const res = await postJson(`${base}/query`, { question: "What does it check?" });
    const body = await res.json();

    expect(body).toMatchObject({ sources: [{ index: 0 }, { index: 1 }, { index: 2 }] });
  });

  it("reports found: false for an empty document", async () => {
    service = await build(ScriptedGenerator.replying("Made up."), "");
    const base = await serve();

    const body = await (await postJson(`${base}/query`, { question: "Anything?" })).json();

    expect(body).toMatchObject({ answer: DEFAULT_NOT_FOUND_MESSAGE, found: false, sources: [] });
  });

  it.each([
    [{}],
    [{ question: "" }],
    [{ question: "   " }],
    [{ question: "x".repeat(501) }],
    [{ question: "Why?", max_results: 0 }],
    [{ question: "Why?", max_results: 11 }],
    [{ question: "Why?", max_results: 2.5 }],
  ])("rejects the invalid body %j", async (payload) => {
    service = await build(ScriptedGenerator.replying("ok"));
    const base = await serve();

    const res = await postJson(`${base}/query`, payload);

    expect(res.status).toBe(400);
  });

  it("rejects malformed JSON", async () => {
    service = await build(ScriptedGenerator.replying("ok"));
    const base = await serve();

    const res = await fetch(`${base}/query`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{ not json",
    });

    expect(res.status).toBe(400);
  });

  it("returns 503 while the index is building", async () => {
    const base = await serve();

    const res = await postJson(`${base}/query`, { question: "What does it check?" });

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ detail: "Document index is still building" });
  });

  it("returns 503 when the model provider fails", async () => {
    service = await build(
      new ScriptedGenerator(async () => {
        throw new GenerationError("Generation request failed: quota");
      }),
    );
    const base = await serve();

    const res = await postJson(`${base}/query`, { question: "What does it check?" });

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      detail: "Upstream model error: Generation request failed: quota",
    });
  });

  it("returns 500 for unexpected failures", async () => {
    service = await build(
      new ScriptedGenerator(async () => {
        throw new TypeError("boom");
      }),
    );
    const base = await serve();

    const res = await postJson(`${base}/query`, { question: "What does it check?" });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ detail: "Internal server error" });
  });

  it("times out and aborts the upstream call", async () => {
    const seen: AbortSignal[] = [];
    service = await build(
      new ScriptedGenerator(
        (_req, signal) =>
          new Promise<string>((_resolve, reject) => {
            if (signal) seen.push(signal);
            signal?.addEventListener("abort", () =>
              reject(new GenerationError("Generation request failed: aborted")),
            );
          }),
      ),
    );
    const base = await serve({ requestTimeoutMs: 20 });

    const res = await postJson(`${base}/query`, { question: "What does it check?" });

    expect(res.status).toBe(504);
    expect(await res.json()).toMatchObject({ detail: "Request timed out" });
    expect(seen).toHaveLength(1);
    expect(seen[0].aborted).toBe(true);
  });
});

describe("CORS", () => {
  it("answers preflight requests for /query", async () => {
    const base = await serve();

    const res = await fetch(`${base}/query`, {
      method: "OPTIONS",
      headers: { origin: "https://docs.test", "access-control-request-method": "POST" },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
  });

  it("uses the configured origin on /health", async () => {
    const base = await serve({ corsOrigin: "https://docs.test" });

    const res = await fetch(`${base}/health`);

    expect(res.headers.get("access-control-allow-origin")).toBe("https://docs.test");
  });
});

describe("GET /health", () => {
  it("reports initializing before the hand-off", async () => {
    const base = await serve();

    const body = await (await fetch(`${base}/health`)).json();

    expect(body).toMatchObject({
      status: "initializing",
      version: "9.9.9",
      documentPath: "audit.txt",
      ready: false,
    });
  });

  it("reports healthy once the service is available", async () => {
    service = await build(ScriptedGenerator.replying("ok"));
    const base = await serve();

    expect(await (await fetch(`${base}/health`)).json()).toMatchObject({ status: "healthy" });
  });

  it("reports degraded without an API key", async () => {
    service = await build(ScriptedGenerator.replying("ok"));
    const base = await serve({ hasApiKey: false });

    expect(await (await fetch(`${base}/health`)).json()).toMatchObject({ status: "degraded" });
  });
});

describe("/mcp", () => {
  it("requires a session for non-initialize requests", async () => {
    const base = await serve();

    const res = await postJson(`${base}/mcp`, { jsonrpc: "2.0", id: 1, method: "tools/list" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Bad Request: No valid session ID provided" },
      id: null,
    });
  });

  it("rejects session requests with an unknown id", async () => {
    const base = await serve();

    const res = await fetch(`${base}/mcp`, { headers: { "mcp-session-id": "nope" } });

    expect(res.status).toBe(400);
    expect(await res.text()).toBe("Invalid or missing session ID");
  });

  it("serves the document tools over a streamable session", async () => {
    service = await build(ScriptedGenerator.replying("It checks store compliance."));
    const base = await serve();
    const client = new Client({ name: "http-test", version: "0.0.0" });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${base}/mcp`)));

    try {
      const { tools } = await client.listTools();
      expect(tools.map((t) => t.name)).toEqual(["search_document", "ask_document"]);
    } finally {
      await client.close();
    }
  });
});
