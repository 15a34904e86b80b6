/** Upstream embedding provider failed (network, quota, malformed input, abort). */
export class EmbeddingError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingError";
  }
}

/** Upstream generation provider failed or returned nothing usable. */
export class GenerationError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

/**
 * Vectors and chunks do not line up: counts differ at build time, or a
 * vector's dimensionality differs from the index's.
 */
export class DimensionMismatchError extends Error {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(message: string, expected: number, actual: number) {
    super(`${message} (expected ${expected}, got ${actual})`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** True for failures that originate in an external model provider. */
export function isUpstreamError(err: unknown): err is EmbeddingError | GenerationError {
  return err instanceof EmbeddingError || err instanceof GenerationError;
}

/** Best-effort message extraction for logging and wrapping. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
