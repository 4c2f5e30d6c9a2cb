import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { resolveArtifactPaths, type ArtifactPaths } from "../config";
import { ConfigurationError, errorMessage } from "../errors";
import type { ChunkRecord } from "../types";
import { DocumentMap, chunkRecordSchema } from "../vector/documentMap";
import { FlatL2Index } from "../vector/flatIndex";

export interface LoadedCorpus {
  index: FlatL2Index;
  documents: DocumentMap;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function writeFileReplacing(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, filePath);
}

export class CorpusStore {
  readonly paths: ArtifactPaths;

  constructor(dataDir: string) {
    this.paths = resolveArtifactPaths(dataDir);
  }

  /** Removes every artifact of a previous ingestion run. */
  async clear(): Promise<string[]> {
    const removed: string[] = [];
    for (const filePath of [this.paths.chunksJson, this.paths.vectorIndex, this.paths.documentsMap]) {
      if (await fileExists(filePath)) {
        await fs.rm(filePath);
        removed.push(filePath);
      }
    }
    return removed;
  }

  async writeChunks(chunks: ChunkRecord[]): Promise<void> {
    await writeFileReplacing(this.paths.chunksJson, JSON.stringify(chunks, null, 4));
  }

  async readChunks(): Promise<ChunkRecord[]> {
    const raw = await fs.readFile(this.paths.chunksJson, "utf8");
    return z.array(chunkRecordSchema).parse(JSON.parse(raw));
  }

  async writeIndex(index: FlatL2Index, documents: DocumentMap): Promise<void> {
    if (index.size !== documents.size) {
      throw new Error(`Index has ${index.size} rows but document map has ${documents.size} entries`);
    }
    await writeFileReplacing(this.paths.vectorIndex, index.serialize());
    await writeFileReplacing(this.paths.documentsMap, JSON.stringify(documents.toJSON(), null, 2));
  }

  async load(): Promise<LoadedCorpus> {
    for (const filePath of [this.paths.vectorIndex, this.paths.documentsMap]) {
      if (!(await fileExists(filePath))) {
        throw new ConfigurationError(
          `Artefato ausente: ${filePath}. Execute a ingestao (lexsc-builder ingest) antes de iniciar o servico.`,
        );
      }
    }

    try {
      const index = FlatL2Index.deserialize(await fs.readFile(this.paths.vectorIndex));
      const documents = DocumentMap.parse(JSON.parse(await fs.readFile(this.paths.documentsMap, "utf8")));

      if (index.size !== documents.size) {
        throw new Error(`index has ${index.size} rows, document map has ${documents.size} entries`);
      }

      return { index, documents };
    } catch (error) {
      throw new ConfigurationError(
        `Indice vetorial ou mapa de documentos corrompido (${errorMessage(error)}). Refaca a ingestao.`,
        { cause: error },
      );
    }
  }
}
