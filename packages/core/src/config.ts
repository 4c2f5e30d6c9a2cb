import path from "node:path";
import { ConfigurationError } from "./errors";
import type { RetryPolicy } from "./utils/retry";

export interface AppConfig {
  dataDir: string;
  lawsDir: string;
  chunkSizeLimit: number;
  ingestConcurrency: number;
  embedBatchSize: number;
  embedBatchPauseMs: number;
  embedRetry: RetryPolicy;
  searchRetry: RetryPolicy;
  retrievalTopK: number;
}

export interface ArtifactPaths {
  chunksJson: string;
  vectorIndex: string;
  documentsMap: string;
}

export const CHUNKS_JSON_FILENAME = "chunks_processados.json";
export const VECTOR_INDEX_FILENAME = "vector_index.bin";
export const DOCUMENTS_MAP_FILENAME = "documents_map.json";

function parseIntEnv(name: string, defaultValue: number, min = 0): number {
  const raw = process.env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`ENV ${name} must be an integer. Received: ${raw}`);
  }
  if (parsed < min) {
    throw new ConfigurationError(`ENV ${name} must be >= ${min}. Received: ${raw}`);
  }
  return parsed;
}

export function resolveArtifactPaths(dataDir: string): ArtifactPaths {
  const root = path.resolve(dataDir);
  return {
    chunksJson: path.join(root, CHUNKS_JSON_FILENAME),
    vectorIndex: path.join(root, VECTOR_INDEX_FILENAME),
    documentsMap: path.join(root, DOCUMENTS_MAP_FILENAME),
  };
}

export function loadConfig(): AppConfig {
  return {
    dataDir: process.env.DATA_DIR ?? "./data",
    lawsDir: process.env.LAWS_DIR ?? "./leis",
    chunkSizeLimit: parseIntEnv("CHUNK_SIZE_LIMIT", 1500, 300),
    ingestConcurrency: parseIntEnv("INGEST_CONCURRENCY", 4, 1),
    embedBatchSize: parseIntEnv("EMBED_BATCH_SIZE", 100, 1),
    embedBatchPauseMs: parseIntEnv("EMBED_BATCH_PAUSE_MS", 1000),
    embedRetry: {
      attempts: parseIntEnv("EMBED_RETRY_ATTEMPTS", 5, 1),
      minDelayMs: parseIntEnv("EMBED_RETRY_MIN_MS", 2000),
      maxDelayMs: parseIntEnv("EMBED_RETRY_MAX_MS", 30000),
    },
    searchRetry: {
      attempts: parseIntEnv("SEARCH_RETRY_ATTEMPTS", 3, 1),
      minDelayMs: parseIntEnv("SEARCH_RETRY_MIN_MS", 2000),
      maxDelayMs: parseIntEnv("SEARCH_RETRY_MAX_MS", 60000),
    },
    retrievalTopK: parseIntEnv("RETRIEVAL_TOP_K", 10, 1),
  };
}
