import type { Logger } from "pino";
import type { AppConfig } from "@lexsc/core/config";
import type { Embedder } from "@lexsc/core/embeddings/index";
import { CorpusStore } from "@lexsc/core/storage/corpusStore";
import type { RetryPolicy } from "@lexsc/core/utils/retry";
import type { DocumentMap } from "@lexsc/core/vector/documentMap";
import type { FlatL2Index } from "@lexsc/core/vector/flatIndex";
import type { LlmChatClient } from "./llm/ollama";

/**
 * Everything a query needs, built once at startup and passed explicitly to
 * retrieval and generation. `index`/`documents` are null until loaded.
 */
export interface RagContext {
  embedder: Embedder;
  llm: LlmChatClient;
  index: FlatL2Index | null;
  documents: DocumentMap | null;
  logger: Logger;
  searchRetry: RetryPolicy;
  topK: number;
  generationTemperature: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateRagContextInput {
  config: AppConfig;
  logger: Logger;
  embedder: Embedder;
  llm: LlmChatClient;
  generationTemperature: number;
}

/** Loads the persisted index and document map; throws ConfigurationError when absent or corrupt. */
export async function createRagContext(input: CreateRagContextInput): Promise<RagContext> {
  const store = new CorpusStore(input.config.dataDir);
  const { index, documents } = await store.load();

  input.logger.info(
    { dimension: index.dimension, rows: index.size, documents: documents.size },
    "vector index and document map loaded",
  );

  return {
    embedder: input.embedder,
    llm: input.llm,
    index,
    documents,
    logger: input.logger,
    searchRetry: input.config.searchRetry,
    topK: input.config.retrievalTopK,
    generationTemperature: input.generationTemperature,
  };
}
