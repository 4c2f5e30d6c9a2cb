import fs from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import { Command } from "commander";
import type { AppServices } from "../services";
import { chunkLawText } from "@lexsc/core/chunking";
import { IngestionError, errorMessage } from "@lexsc/core/errors";
import { extractHtmlText } from "@lexsc/core/htmlText";
import { extractArticleId, normalizeLawId } from "@lexsc/core/lawId";
import type { ChunkRecord } from "@lexsc/core/types";
import { sleep, withRetry } from "@lexsc/core/utils/retry";
import { DocumentMap } from "@lexsc/core/vector/documentMap";
import { FlatL2Index } from "@lexsc/core/vector/flatIndex";

export interface IngestOptions {
  lawsDir?: string;
  concurrency?: number;
}

export interface IngestStats {
  filesSeen: number;
  filesSkippedEmpty: number;
  filesFailed: number;
  chunks: number;
  batches: number;
  dimension: number | null;
  removedArtifacts: number;
}

interface FileChunks {
  fileName: string;
  pieces: { text: string; year: number; uniqueId: string }[];
}

function parseOptionalInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer value: ${value}`);
  }
  return parsed;
}

/** Every `.html` file below `root`, in lexicographic path order. */
export async function listHtmlFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(".html")) {
        found.push(fullPath);
      }
    }
  }

  await walk(root);
  return found;
}

function batchList<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

async function chunkFile(services: AppServices, filePath: string): Promise<FileChunks | null> {
  const fileName = path.basename(filePath);
  const html = await fs.readFile(filePath, "utf8");
  const outcome = extractHtmlText(html);

  if (!outcome.ok) {
    if (outcome.reason === "parse_error") {
      throw new IngestionError(`Falha ao extrair texto de ${fileName}: ${errorMessage(outcome.error)}`, {
        cause: outcome.error,
      });
    }
    services.logger.warn({ file: fileName, reason: outcome.reason }, "ingest skipped file without extractable text");
    return null;
  }

  if (outcome.text.length === 0) {
    return null;
  }

  const { id, year } = normalizeLawId(fileName);
  const chunks = chunkLawText(outcome.text, fileName, year, services.config.chunkSizeLimit);

  services.logger.debug({ file: fileName, lawId: id, chunks: chunks.length }, "ingest chunked file");

  return {
    fileName,
    pieces: chunks.map((text) => ({ text, year, uniqueId: extractArticleId(text, id) })),
  };
}

export async function buildChunkRecords(
  services: AppServices,
  files: string[],
  concurrency: number,
  stats: IngestStats,
): Promise<ChunkRecord[]> {
  const limiter = pLimit(concurrency);

  // Results keep file order so doc_N ids are stable across runs.
  const perFile = await Promise.all(
    files.map((filePath) =>
      limiter(async () => {
        try {
          return await chunkFile(services, filePath);
        } catch (error) {
          stats.filesFailed += 1;
          services.logger.error({ file: filePath, err: errorMessage(error) }, "ingest failed to read or extract file");
          const failed: FileChunks = { fileName: path.basename(filePath), pieces: [] };
          return failed;
        }
      }),
    ),
  );

  const records: ChunkRecord[] = [];
  for (const file of perFile) {
    if (!file) {
      stats.filesSkippedEmpty += 1;
      continue;
    }

    for (const [chunkIndex, piece] of file.pieces.entries()) {
      records.push({
        id: `doc_${records.length + 1}`,
        text: piece.text,
        metadata: {
          fonte: file.fileName,
          ano_publicacao: piece.year,
          chunk_index: chunkIndex,
          ID_UNICO: piece.uniqueId,
        },
      });
    }
  }

  return records;
}

async function embedChunks(services: AppServices, records: ChunkRecord[], stats: IngestStats): Promise<number[][]> {
  const wait = services.sleep ?? sleep;
  const batches = batchList(
    records.map((record) => record.text),
    services.config.embedBatchSize,
  );
  const vectors: number[][] = [];

  for (const [batchIndex, texts] of batches.entries()) {
    services.logger.info(
      { batch: batchIndex + 1, totalBatches: batches.length, size: texts.length },
      "ingest embedding batch",
    );

    let embedded: number[][];
    try {
      embedded = await withRetry(() => services.embedder.embedBatch(texts), {
        policy: services.config.embedRetry,
        label: `embedding batch ${batchIndex + 1}/${batches.length}`,
        logger: services.logger,
        sleep: wait,
      });
    } catch (error) {
      throw new IngestionError(
        `Falha ao gerar embeddings do lote ${batchIndex + 1}/${batches.length}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (embedded.length !== texts.length) {
      throw new IngestionError(
        `Lote ${batchIndex + 1} retornou ${embedded.length} vetores para ${texts.length} chunks`,
      );
    }

    vectors.push(...embedded);
    stats.batches += 1;

    if (batchIndex < batches.length - 1 && services.config.embedBatchPauseMs > 0) {
      await wait(services.config.embedBatchPauseMs);
    }
  }

  return vectors;
}

function buildIndex(vectors: number[][]): FlatL2Index {
  const dimension = vectors[0].length;
  const mismatch = vectors.findIndex((vector) => vector.length !== dimension);
  if (mismatch >= 0) {
    throw new IngestionError(
      `Embedding dimension mismatch at chunk ${mismatch + 1}: expected ${dimension}, got ${vectors[mismatch].length}`,
    );
  }
  return FlatL2Index.fromVectors(vectors);
}

export async function runIngest(services: AppServices, options: IngestOptions = {}): Promise<IngestStats> {
  const lawsDir = options.lawsDir ?? services.config.lawsDir;
  const stats: IngestStats = {
    filesSeen: 0,
    filesSkippedEmpty: 0,
    filesFailed: 0,
    chunks: 0,
    batches: 0,
    dimension: null,
    removedArtifacts: 0,
  };

  if (!services.dryRun) {
    const removed = await services.store.clear();
    stats.removedArtifacts = removed.length;
    if (removed.length > 0) {
      services.logger.info({ removed }, "ingest removed previous artifacts");
    }
  }

  let files: string[];
  try {
    files = await listHtmlFiles(lawsDir);
  } catch (error) {
    throw new IngestionError(`Nao foi possivel ler o diretorio de leis ${lawsDir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  stats.filesSeen = files.length;

  const records = await buildChunkRecords(
    services,
    files,
    options.concurrency ?? services.config.ingestConcurrency,
    stats,
  );
  stats.chunks = records.length;

  if (services.dryRun) {
    services.logger.info({ stats, lawsDir, dryRun: true }, "ingest completed");
    return stats;
  }

  await services.store.writeChunks(records);
  services.logger.info({ chunks: records.length, file: services.store.paths.chunksJson }, "ingest saved chunks");

  if (records.length === 0) {
    services.logger.warn({ lawsDir }, "ingest found no chunks; index not built");
    return stats;
  }

  const vectors = await embedChunks(services, records, stats);
  if (vectors.length !== records.length) {
    throw new IngestionError(`Gerados ${vectors.length} vetores para ${records.length} chunks`);
  }

  const index = buildIndex(vectors);
  stats.dimension = index.dimension;

  await services.store.writeIndex(index, DocumentMap.fromChunks(records));

  services.logger.info(
    { stats, index: services.store.paths.vectorIndex, documentsMap: services.store.paths.documentsMap },
    "ingest completed",
  );
  return stats;
}

export function registerIngestCommand(
  program: Command,
  getServices: () => Promise<AppServices>,
): void {
  program
    .command("ingest")
    .description("Reconstroi chunks, indice vetorial e mapa de documentos a partir dos HTML das leis")
    .option("--laws-dir <dir>", "Diretorio com os arquivos .html das leis")
    .option("--concurrency <number>", "Concorrencia de leitura/extracao", parseOptionalInt)
    .action(async (cmdOptions: IngestOptions) => {
      const services = await getServices();
      await runIngest(services, cmdOptions);
    });
}
