import { z } from "zod";
import type { ChunkRecord, IndexedChunkRecord } from "../types";

export const chunkMetadataSchema = z.object({
  fonte: z.string(),
  ano_publicacao: z.number().int(),
  chunk_index: z.number().int().min(0),
  ID_UNICO: z.string(),
});

export const chunkRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  metadata: chunkMetadataSchema,
});

const indexedChunkRecordSchema = chunkRecordSchema.extend({
  row_index: z.number().int().min(0),
});

const documentMapSchema = z.record(indexedChunkRecordSchema);

/**
 * Chunk lookup keyed by vector-index row. Rows must be unique and cover
 * 0..size-1.
 */
export class DocumentMap {
  private constructor(private readonly rows: IndexedChunkRecord[]) {}

  static fromRecords(records: IndexedChunkRecord[]): DocumentMap {
    const rows: IndexedChunkRecord[] = new Array(records.length);
    const ids = new Set<string>();

    for (const record of records) {
      if (record.row_index >= records.length) {
        throw new Error(`Chunk ${record.id} has row_index ${record.row_index} outside 0..${records.length - 1}`);
      }
      if (rows[record.row_index] !== undefined) {
        throw new Error(`Duplicated row_index ${record.row_index} (chunk ${record.id})`);
      }
      if (ids.has(record.id)) {
        throw new Error(`Duplicated chunk id ${record.id}`);
      }
      ids.add(record.id);
      rows[record.row_index] = record;
    }

    return new DocumentMap(rows);
  }

  static fromChunks(chunks: ChunkRecord[]): DocumentMap {
    return DocumentMap.fromRecords(chunks.map((chunk, rowIndex) => ({ ...chunk, row_index: rowIndex })));
  }

  static parse(raw: unknown): DocumentMap {
    const parsed = documentMapSchema.parse(raw);
    const records = Object.entries(parsed).map(([key, record]) => {
      if (key !== record.id) {
        throw new Error(`Document map key ${key} does not match chunk id ${record.id}`);
      }
      return record;
    });
    return DocumentMap.fromRecords(records);
  }

  get size(): number {
    return this.rows.length;
  }

  atRow(row: number): IndexedChunkRecord | undefined {
    return this.rows[row];
  }

  /** Records in row order. */
  records(): readonly IndexedChunkRecord[] {
    return this.rows;
  }

  toJSON(): Record<string, IndexedChunkRecord> {
    const output: Record<string, IndexedChunkRecord> = {};
    for (const record of this.rows) {
      output[record.id] = record;
    }
    return output;
  }
}
