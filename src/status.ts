import { APP_VERSION } from "./config";

/**
 * Counters for the startup indexing pass. All values are monotonic,
 * non-negative integers updated in-place.
 */
export interface IndexingStatus {
  /** Chunks that will be embedded (whitespace-only chunks excluded). */
  chunksTotal: number;
  /** Chunks whose embeddings have come back so far. */
  chunksEmbedded: number;
  /** Embedding dimensionality of the built index (0 until ready). */
  dimension: number;
}

/**
 * In-memory snapshot of server lifecycle and indexing progress, served by
 * the health endpoint.
 *
 * ready = true ONLY once the index is fully built and handed to the
 * transports; during the build the counters move but `ready` stays false.
 */
export interface ServerStatus {
  /** Package version (kept in sync with package.json). */
  version: string;
  /** Source document path. */
  documentPath: string;
  embeddingModel: string;
  llmModel: string;
  /** Active transport: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  indexing: IndexingStatus;
}

/**
 * Owner of the mutable status state. One instance per server process,
 * passed explicitly to whatever reports progress or reads it.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      documentPath: initial?.documentPath ?? "",
      embeddingModel: initial?.embeddingModel ?? "",
      llmModel: initial?.llmModel ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: { chunksTotal: 0, chunksEmbedded: 0, dimension: 0, ...initial?.indexing },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocumentPath(p: string) {
    this.data.documentPath = p;
  }

  public setModels(embeddingModel: string, llmModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.llmModel = llmModel;
  }

  public setIndexTotals(chunks: number) {
    this.data.indexing.chunksTotal = chunks;
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  /** Transition ready=false -> true once the built index is published. */
  public markReady(dimension: number) {
    this.data.indexing.dimension = dimension;
    this.data.ready = true;
  }

  /** Detached copy of the current status. */
  public getStatus(): ServerStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }

  public toJSON(): ServerStatus {
    return this.getStatus();
  }
}
