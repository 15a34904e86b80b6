import { Answerer } from "./answerer";
import type { Config } from "./config";
import { loadDocument } from "./document";
import { OpenAIEmbeddings, type Embedder } from "./embeddings";
import { OpenAIGenerator, type TextGenerator } from "./generation";
import { buildRagService, type RagService } from "./rag";
import type { StatusManager } from "./status";

export interface Providers {
  embedder: Embedder;
  generator: TextGenerator;
}

/** Upstream model clients as configured. */
export function createProviders(config: Config): Providers {
  return {
    embedder: new OpenAIEmbeddings({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
      modelName: config.embeddingModel,
      batchSize: config.embeddingBatchSize,
    }),
    generator: new OpenAIGenerator({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
      modelName: config.llmModel,
    }),
  };
}

/**
 * Load the configured document and build a ready service from it. Shared by
 * the server entry point and the ask CLI.
 */
export async function createRagService(
  config: Config,
  providers: Providers,
  status?: StatusManager,
): Promise<RagService> {
  const document = await loadDocument(config.documentPath);
  console.error(`[RAG] Document loaded: ${document.path} (${document.text.length} characters)`);
  status?.setDocumentPath(document.path);
  status?.setModels(providers.embedder.modelName, providers.generator.modelName);

  return buildRagService({
    document,
    embedder: providers.embedder,
    answerer: new Answerer(providers.generator),
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    metric: config.metric,
    topK: config.topK,
    status,
    verbose: config.verbose,
  });
}
