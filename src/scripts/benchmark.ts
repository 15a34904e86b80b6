/**
 * Fire N concurrent POST /query requests at a running server and report
 * latency. Configure with BENCHMARK_URL, BENCHMARK_REQUESTS and
 * BENCHMARK_QUESTION.
 */
import path from "node:path";
import { fileURLToPath } from "node:url";

export type RunOutcome = { ok: true; seconds: number } | { ok: false; error: string };

export interface RunSummary {
  total: number;
  succeeded: number;
  /** Wall-clock time for the whole batch. */
  totalSeconds: number;
  averageSeconds: number;
  minSeconds: number;
  maxSeconds: number;
}

/**
 * Aggregate per-request outcomes. The average is the batch wall-clock time
 * divided by the number of successful requests; undefined when none succeeded.
 */
export function summarizeRuns(
  outcomes: readonly RunOutcome[],
  totalSeconds: number,
): RunSummary | undefined {
  const times = outcomes.flatMap((o) => (o.ok ? [o.seconds] : []));
  if (times.length === 0) return undefined;
  return {
    total: outcomes.length,
    succeeded: times.length,
    totalSeconds,
    averageSeconds: totalSeconds / times.length,
    minSeconds: Math.min(...times),
    maxSeconds: Math.max(...times),
  };
}

/** One line of the per-request listing. */
export function formatOutcome(outcome: RunOutcome, i: number): string {
  return outcome.ok
    ? `    Request ${i + 1}: ${outcome.seconds.toFixed(2)}s`
    : `    Request ${i + 1}: FAILED (${outcome.error})`;
}

async function fetchOne(url: string, question: string): Promise<RunOutcome> {
  const start = performance.now();
  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ question, max_results: 3 }),
    });
    await res.json();
    if (res.status !== 200) return { ok: false, error: `HTTP ${res.status}` };
    return { ok: true, seconds: (performance.now() - start) / 1000 };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

async function main(): Promise<void> {
  const url = process.env.BENCHMARK_URL ?? "http://127.0.0.1:8000/query";
  const count = Math.max(1, Number(process.env.BENCHMARK_REQUESTS ?? 10) || 10);
  const question = process.env.BENCHMARK_QUESTION ?? "What does the document describe?";
  const line = "=".repeat(60);

  console.log(line);
  console.log(`  RAG API Benchmark - ${count} Concurrent Requests`);
  console.log(line);
  console.log(`  Endpoint: POST ${url}`);
  console.log(`  Question: ${question}`);
  console.log(line);

  const started = performance.now();
  const outcomes = await Promise.all(Array.from({ length: count }, () => fetchOne(url, question)));
  const summary = summarizeRuns(outcomes, (performance.now() - started) / 1000);

  const failures = outcomes.flatMap((o, i) => (o.ok ? [] : [`    Request ${i + 1}: ${o.error}`]));
  if (failures.length) console.log(["", "  FAILED REQUESTS", ...failures].join("\n"));
  if (!summary) {
    console.log("\n  No successful requests.");
    process.exitCode = 1;
    return;
  }

  console.log(
    [
      "",
      "  RESULTS",
      "-".repeat(60),
      `  Successful: ${summary.succeeded}/${summary.total}`,
      `  Total time (all complete):  ${summary.totalSeconds.toFixed(2)}s`,
      `  Average time per request:   ${summary.averageSeconds.toFixed(2)}s`,
      `  Min time per request:       ${summary.minSeconds.toFixed(2)}s`,
      `  Max time per request:       ${summary.maxSeconds.toFixed(2)}s`,
      "-".repeat(60),
      ...outcomes.map(formatOutcome),
      line,
    ].join("\n"),
  );
}

if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  main().catch((e: unknown) => {
    console.error("[RAG] benchmark failed:", e);
    process.exitCode = 1;
  });
}
