import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION, MAX_TOP_K } from "./config";
import { describeError } from "./errors";
import type { RagService } from "./rag";
import type { RetrievalResult } from "./types";

const SearchArgs = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

const AskArgs = z.object({
  question: z.string().trim().min(1, "question must not be empty").max(500),
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
});

type TextResult = {
  content: Array<{ type: "text"; text: string }>;
};

function jsonResult(value: unknown): TextResult {
  return { content: [{ type: "text", text: JSON.stringify(value) }] };
}

function toMatches(result: RetrievalResult) {
  return result.map((r) => ({
    index: r.chunk.index,
    score: Number(r.score.toFixed(4)),
    text: r.chunk.text,
  }));
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, detail);
  }
  return parsed.data;
}

/**
 * Factory for an MCP server exposing the document tools. A fresh instance is
 * created per transport session; the service is read through `getService`
 * so tools can be listed before the index build has been handed off.
 *
 * Tool contracts:
 *  search_document
 *    Input:  { query: string, top_k?: number }
 *    Output: { matches: Array<{ index: number, score: number, text: string }> }
 *  ask_document
 *    Input:  { question: string, top_k?: number }
 *    Output: { answer: string, found: boolean, sources: <matches> }
 *
 * Invalid arguments raise InvalidParams, unknown tools MethodNotFound, and
 * upstream model failures InternalError.
 */
export function createMcpServer(getService: () => RagService | undefined): Server {
  const server = new Server(
    { name: "doc-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "search_document",
          description:
            "Semantically search the loaded document and return the most similar chunks with their similarity score.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language search query." },
              top_k: {
                type: "number",
                description: `Maximum number of chunks to return (1-${MAX_TOP_K}).`,
                minimum: 1,
                maximum: MAX_TOP_K,
              },
            },
            required: ["query"],
          },
        },
        {
          name: "ask_document",
          description:
            "Answer a question using only the loaded document. `found` is false when the document does not contain the answer.",
          inputSchema: {
            type: "object",
            properties: {
              question: { type: "string", description: "Question about the document." },
              top_k: {
                type: "number",
                description: `Number of chunks used as context (1-${MAX_TOP_K}).`,
                minimum: 1,
                maximum: MAX_TOP_K,
              },
            },
            required: ["question"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params;

    if (name === "search_document") {
      const { query, top_k } = parseArgs(SearchArgs, args);
      const service = requireService(getService);
      const result = await upstream(() => service.search(query, { topK: top_k }));
      return jsonResult({ matches: toMatches(result) });
    }

    if (name === "ask_document") {
      const { question, top_k } = parseArgs(AskArgs, args);
      const service = requireService(getService);
      const result = await upstream(() => service.ask(question, { topK: top_k }));
      return jsonResult({
        answer: result.answer,
        found: result.found,
        sources: toMatches(result.sources),
      });
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}

function requireService(getService: () => RagService | undefined): RagService {
  const service = getService();
  if (!service) throw new McpError(ErrorCode.InternalError, "Document index is still building");
  return service;
}

async function upstream<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    console.error("[RAG] Tool call failed:", e);
    throw new McpError(ErrorCode.InternalError, describeError(e));
  }
}
