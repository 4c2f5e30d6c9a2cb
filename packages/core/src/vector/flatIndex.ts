export interface VectorSearchHit {
  row: number;
  distance: number;
}

const INDEX_MAGIC = "LXFI";
const INDEX_VERSION = 1;
const HEADER_BYTES = 16;

/**
 * Exact nearest-neighbour index over float32 rows, ranked by squared L2
 * distance. Append-only; rows keep their insertion position.
 */
export class FlatL2Index {
  private data: Float32Array;
  private rows = 0;

  constructor(readonly dimension: number, initialCapacity = 0) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Vector dimension must be a positive integer (got ${dimension})`);
    }
    this.data = new Float32Array(dimension * Math.max(0, initialCapacity));
  }

  static fromVectors(vectors: number[][]): FlatL2Index {
    if (vectors.length === 0) {
      throw new Error("Cannot build an index without vectors");
    }
    const index = new FlatL2Index(vectors[0].length, vectors.length);
    index.add(vectors);
    return index;
  }

  get size(): number {
    return this.rows;
  }

  private ensureCapacity(rows: number): void {
    const required = rows * this.dimension;
    if (required <= this.data.length) {
      return;
    }
    const next = new Float32Array(Math.max(required, this.data.length * 2));
    next.set(this.data.subarray(0, this.rows * this.dimension));
    this.data = next;
  }

  add(vectors: number[][]): void {
    this.ensureCapacity(this.rows + vectors.length);

    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw new Error(
          `Vector dimension mismatch at row ${this.rows}: expected ${this.dimension}, got ${vector.length}`,
        );
      }
      this.data.set(vector, this.rows * this.dimension);
      this.rows += 1;
    }
  }

  vectorAt(row: number): Float32Array {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new RangeError(`Row ${row} is outside the index (size ${this.rows})`);
    }
    return this.data.slice(row * this.dimension, (row + 1) * this.dimension);
  }

  search(query: ArrayLike<number>, k: number): VectorSearchHit[] {
    if (query.length !== this.dimension) {
      throw new Error(`Query dimension mismatch: expected ${this.dimension}, got ${query.length}`);
    }

    const limit = Math.min(Math.max(0, Math.floor(k)), this.rows);
    if (limit === 0) {
      return [];
    }

    const hits: VectorSearchHit[] = [];
    for (let row = 0; row < this.rows; row += 1) {
      const offset = row * this.dimension;
      let distance = 0;
      for (let column = 0; column < this.dimension; column += 1) {
        const delta = this.data[offset + column] - query[column];
        distance += delta * delta;
      }
      hits.push({ row, distance });
    }

    hits.sort((left, right) => left.distance - right.distance || left.row - right.row);
    return hits.slice(0, limit);
  }

  serialize(): Buffer {
    const body = this.rows * this.dimension;
    const buffer = Buffer.alloc(HEADER_BYTES + body * 4);
    buffer.write(INDEX_MAGIC, 0, "ascii");
    buffer.writeUInt32LE(INDEX_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.rows, 12);
    for (let position = 0; position < body; position += 1) {
      buffer.writeFloatLE(this.data[position], HEADER_BYTES + position * 4);
    }
    return buffer;
  }

  static deserialize(buffer: Buffer): FlatL2Index {
    if (buffer.length < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== INDEX_MAGIC) {
      throw new Error("Vector index file has an unknown format");
    }

    const version = buffer.readUInt32LE(4);
    if (version !== INDEX_VERSION) {
      throw new Error(`Unsupported vector index version ${version}`);
    }

    const dimension = buffer.readUInt32LE(8);
    const rows = buffer.readUInt32LE(12);
    const expectedBytes = HEADER_BYTES + rows * dimension * 4;
    if (buffer.length !== expectedBytes) {
      throw new Error(`Vector index file is truncated: expected ${expectedBytes} bytes, got ${buffer.length}`);
    }

    const index = new FlatL2Index(dimension, rows);
    for (let position = 0; position < rows * dimension; position += 1) {
      index.data[position] = buffer.readFloatLE(HEADER_BYTES + position * 4);
    }
    index.rows = rows;
    return index;
  }
}
