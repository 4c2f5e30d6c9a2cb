import type { Logger } from "pino";
import type { AppConfig } from "@lexsc/core/config";
import type { Embedder } from "@lexsc/core/embeddings/index";
import type { CorpusStore } from "@lexsc/core/storage/corpusStore";

export interface AppServices {
  config: AppConfig;
  logger: Logger;
  embedder: Embedder;
  store: CorpusStore;
  dryRun: boolean;
  sleep?: (ms: number) => Promise<void>;
}
