import { open, type FileHandle } from "node:fs/promises";
import { IoError, io } from "./errors.js";
import type { Embedding } from "./types.js";

export const FLOAT_BYTES = 4;

export function recordSize(dimensions: number): number {
  return dimensions * FLOAT_BYTES;
}

/** Little-endian IEEE-754 float32, records back to back. */
export function encodeEmbeddings(embeddings: Embedding[], dimensions: number): Buffer {
  const size = recordSize(dimensions);
  const buffer = Buffer.alloc(embeddings.length * size);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  embeddings.forEach((embedding, record) => {
    if (embedding.length !== dimensions) {
      throw new RangeError(
        `Embedding ${record} has ${embedding.length} dimensions, expected ${dimensions}`,
      );
    }
    const base = record * size;
    for (let i = 0; i < dimensions; i++) {
      view.setFloat32(base + i * FLOAT_BYTES, embedding[i] ?? 0, true);
    }
  });

  return buffer;
}

export function decodeEmbeddings(buffer: Uint8Array, dimensions: number): Embedding[] {
  const size = recordSize(dimensions);
  if (buffer.byteLength % size !== 0) {
    throw new RangeError(`${buffer.byteLength} bytes is not a whole number of ${size}-byte records`);
  }
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const embeddings: Embedding[] = [];
  for (let base = 0; base < buffer.byteLength; base += size) {
    const embedding = new Float32Array(dimensions);
    for (let i = 0; i < dimensions; i++) {
      embedding[i] = view.getFloat32(base + i * FLOAT_BYTES, true);
    }
    embeddings.push(embedding);
  }
  return embeddings;
}

/**
 * Flat file of fixed-size embedding records. Record `n` lives at byte
 * `n * recordSize`, so a batch rewritten at the same index lands on the
 * same bytes.
 */
export class VectorStore {
  readonly recordSize: number;

  private constructor(
    private readonly handle: FileHandle,
    readonly filePath: string,
    readonly dimensions: number,
  ) {
    this.recordSize = recordSize(dimensions);
  }

  static async open(filePath: string, dimensions: number): Promise<VectorStore> {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new RangeError(`Dimensions must be a positive integer, got ${dimensions}`);
    }
    // "a+" would force appends; "r+" needs the file to exist.
    const handle = await io("open", filePath, async () => {
      const created = await open(filePath, "a");
      await created.close();
      return open(filePath, "r+");
    });
    return new VectorStore(handle, filePath, dimensions);
  }

  /** Writes the batch at `startIndex` and forces it to disk before resolving. */
  async write(startIndex: number, embeddings: Embedding[]): Promise<void> {
    if (embeddings.length === 0) return;
    const bytes = encodeEmbeddings(embeddings, this.dimensions);
    const position = startIndex * this.recordSize;

    await io("write", this.filePath, async () => {
      let written = 0;
      while (written < bytes.length) {
        const { bytesWritten } = await this.handle.write(
          bytes,
          written,
          bytes.length - written,
          position + written,
        );
        written += bytesWritten;
      }
    });
    await io("sync", this.filePath, () => this.handle.datasync());
  }

  async read(startIndex: number, count: number): Promise<Embedding[]> {
    const length = count * this.recordSize;
    const buffer = Buffer.alloc(length);
    const position = startIndex * this.recordSize;

    const bytesRead = await io("read", this.filePath, async () => {
      let total = 0;
      while (total < length) {
        const { bytesRead: n } = await this.handle.read(buffer, total, length - total, position + total);
        if (n === 0) break;
        total += n;
      }
      return total;
    });
    if (bytesRead < length) {
      throw new IoError(
        "read",
        this.filePath,
        new Error(`short read: wanted records [${startIndex}, ${startIndex + count}), file ends first`),
      );
    }
    return decodeEmbeddings(buffer, this.dimensions);
  }

  async recordCount(): Promise<number> {
    const { size } = await io("stat", this.filePath, () => this.handle.stat());
    return Math.floor(size / this.recordSize);
  }

  async close(): Promise<void> {
    await io("close", this.filePath, () => this.handle.close());
  }
}
