/**
 * Interactive one-shot question against the configured document.
 *
 *   npm run ask -- "What does the audit check?"
 *
 * Without an argument the question is read from stdin. Prints the retrieved
 * chunks with their scores, then the answer.
 */
import path from "node:path";
import readline from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { getConfig } from "./config";
import { createProviders, createRagService } from "./providers";
import type { AskResult } from "./rag";
import type { SimilarityMetric } from "./types";

const SEPARATOR = "═".repeat(60);

/** Human-readable report of an answered question. */
export function formatReport(result: AskResult, metric: SimilarityMetric): string {
  const lines: string[] = ["", SEPARATOR, "  RETRIEVED CHUNKS", SEPARATOR, ""];
  result.sources.forEach((s, i) => {
    const score =
      metric === "cosine"
        ? `Cosine: ${s.score.toFixed(4)}`
        : `Similarity: ${(s.score * 100).toFixed(2)}%`;
    lines.push(`  ┌─ Chunk #${i + 1} (index ${s.chunk.index})`);
    lines.push(`  │  ${score}  |  ${s.chunk.text.length} chars`);
    lines.push("  │");
    lines.push("  │  Text:");
    for (const line of s.chunk.text.split(/\r?\n/)) lines.push(`  │    ${line}`);
    lines.push(`  └${"─".repeat(58)}`, "");
  });
  if (result.sources.length === 0) lines.push("  (no chunks retrieved)", "");
  lines.push(SEPARATOR, result.found ? "  AI ANSWER" : "  AI ANSWER (not found in context)");
  lines.push(SEPARATOR, "");
  lines.push(result.answer, "", SEPARATOR);
  return lines.join("\n");
}

async function readQuestion(): Promise<string> {
  const fromArgs = process.argv.slice(2).join(" ").trim();
  if (fromArgs) return fromArgs;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("\nAsk a question about the document: ")).trim();
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const question = await readQuestion();
  if (!question) {
    console.error("[RAG] No question given.");
    process.exitCode = 1;
    return;
  }
  const service = await createRagService(config, createProviders(config));
  const result = await service.ask(question);
  console.log(formatReport(result, service.index.metric));
}

// Only run when executed directly, not when imported by tests.
if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  main().catch((e: unknown) => {
    console.error("[RAG] ask failed:", e);
    process.exitCode = 1;
  });
}
