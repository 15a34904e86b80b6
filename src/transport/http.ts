/**
 * HTTP transport: REST question answering plus streamable MCP.
 *
 * Endpoints:
 *  - POST /query  : { question, max_results? } -> { answer, found, sources, request_id }
 *  - GET  /health : readiness + indexing status
 *  - POST /mcp    : MCP JSON-RPC (initialize creates a session, later calls
 *                   carry the `mcp-session-id` header)
 *  - GET|DELETE /mcp : session stream / teardown, delegated to the transport
 *
 * /query and /health send CORS headers (CORS_ORIGIN, default "*").
 *
 * Status codes for /query:
 *  - 400 invalid body or malformed JSON
 *  - 503 index not built yet, or the embedding/generation provider failed
 *  - 504 request timed out (pending upstream calls are aborted)
 *  - 500 anything else
 *
 * The listener starts before the index is built; `getService` returns
 * undefined until the finished service has been handed off.
 */
import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { MAX_TOP_K } from "../config";
import { describeError, isUpstreamError } from "../errors";
import type { RagService } from "../rag";
import type { StatusManager } from "../status";

export interface HttpDeps {
  getService: () => RagService | undefined;
  status: StatusManager;
  /** Factory producing a new, unconnected MCP server per session. */
  createMcpServer: () => Server;
  /** Whether an upstream API key is configured (reported by /health). */
  hasApiKey: boolean;
  requestTimeoutMs: number;
  /** Host allow-list for MCP DNS rebinding protection. */
  allowedHosts?: string[];
  /** Access-Control-Allow-Origin for the REST routes (default "*"). */
  corsOrigin?: string;
}

export interface HttpListenOptions {
  host: string;
  port: number;
}

const QueryBody = z.object({
  question: z.string().trim().min(1).max(500),
  max_results: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

/** Build the Express application without binding a port. */
export function createHttpApp(deps: HttpDeps): express.Express {
  const app = express();
  app.use(["/query", "/health"], allowCors(deps.corsOrigin ?? "*"));
  app.use(express.json({ limit: "1mb" }));

  app.post("/query", async (req: Request, res: Response) => {
    const requestId = randomUUID();
    const parsed = QueryBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ detail: parsed.error.issues, request_id: requestId });
      return;
    }
    const service = deps.getService();
    if (!service) {
      res.status(503).json({ detail: "Document index is still building", request_id: requestId });
      return;
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error("Request timed out"));
    }, deps.requestTimeoutMs);
    // Client went away before we answered: stop the upstream calls.
    const onClose = () => {
      if (!res.writableEnded) controller.abort(new Error("Client disconnected"));
    };
    res.on("close", onClose);

    try {
      const { question, max_results } = parsed.data;
      const result = await service.ask(question, {
        topK: max_results,
        signal: controller.signal,
      });
      res.json({
        answer: result.answer,
        found: result.found,
        sources: result.sources.map((s) => ({
          index: s.chunk.index,
          text: s.chunk.text,
          score: s.score,
        })),
        request_id: requestId,
      });
    } catch (err) {
      console.error(`[RAG] /query ${requestId} failed:`, err);
      if (res.headersSent) return;
      if (timedOut) {
        res.status(504).json({ detail: "Request timed out", request_id: requestId });
      } else if (isUpstreamError(err)) {
        res
          .status(503)
          .json({ detail: `Upstream model error: ${describeError(err)}`, request_id: requestId });
      } else {
        res.status(500).json({ detail: "Internal server error", request_id: requestId });
      }
    } finally {
      clearTimeout(timer);
      res.off("close", onClose);
    }
  });

  app.get("/health", (_req: Request, res: Response) => {
    const state = !deps.getService() ? "initializing" : deps.hasApiKey ? "healthy" : "degraded";
    res.json({ status: state, ...deps.status.getStatus() });
  });

  mountMcp(app, deps);

  // Body parser failures (malformed JSON, oversized payloads) carry a 4xx status.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = clientErrorStatus(err);
    if (status) {
      res.status(status).json({ detail: describeError(err) });
      return;
    }
    console.error("[RAG] Unhandled HTTP error:", err);
    res.status(500).json({ detail: "Internal server error" });
  });

  return app;
}

/**
 * Streamable MCP endpoint. Each session owns its own MCP server + transport
 * pair; the session map is in-memory only.
 */
function mountMcp(app: express.Express, deps: HttpDeps): void {
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      // Session creation only when no header AND the body is an initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection: deps.allowedHosts !== undefined,
          allowedHosts: deps.allowedHosts,
        });
        const server = deps.createMcpServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[RAG] MCP session close failed:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] MCP HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] MCP HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);
}

/** Browser access to the REST routes; preflight requests end here. */
function allowCors(origin: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  };
}

function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

/** Bind the app and resolve once the listener is ready. */
export async function startHttpTransport(
  deps: HttpDeps,
  opts: HttpListenOptions,
): Promise<HttpServer> {
  const app = createHttpApp(deps);
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] HTTP listening at http://${opts.host}:${opts.port} (POST /query, /mcp)`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
