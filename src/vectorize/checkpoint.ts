import { open, type FileHandle } from "node:fs/promises";
import { IoError, io } from "./errors.js";

/** Size of the on-disk counter: one unsigned 64-bit big-endian integer. */
export const CHECKPOINT_BYTES = 8;

export function encodeCursor(cursor: number): Buffer {
  const buffer = Buffer.alloc(CHECKPOINT_BYTES);
  buffer.writeBigUInt64BE(BigInt(cursor));
  return buffer;
}

/**
 * Durable count of embeddings already stored. The counter only moves after
 * the matching vector bytes are synced, so the vector file always holds at
 * least `cursor` valid records.
 */
export class Checkpoint {
  private constructor(
    private readonly handle: FileHandle,
    readonly filePath: string,
    private current: number,
  ) {}

  /**
   * Opens or creates the checkpoint. A file that is not exactly 8 bytes long
   * is a fresh start: it is reset to zero.
   */
  static async open(filePath: string): Promise<Checkpoint> {
    const handle = await io("open", filePath, async () => {
      const created = await open(filePath, "a");
      await created.close();
      return open(filePath, "r+");
    });

    try {
      return await Checkpoint.load(handle, filePath);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  private static async load(handle: FileHandle, filePath: string): Promise<Checkpoint> {
    const { size } = await io("stat", filePath, () => handle.stat());
    if (size !== CHECKPOINT_BYTES) {
      const checkpoint = new Checkpoint(handle, filePath, 0);
      await io("truncate", filePath, () => handle.truncate(0));
      await checkpoint.persist(0);
      return checkpoint;
    }

    const buffer = Buffer.alloc(CHECKPOINT_BYTES);
    await io("read", filePath, () => handle.read(buffer, 0, CHECKPOINT_BYTES, 0));
    const stored = buffer.readBigUInt64BE();
    if (stored > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new IoError("read", filePath, new Error(`cursor ${stored} is out of range`));
    }
    return new Checkpoint(handle, filePath, Number(stored));
  }

  get cursor(): number {
    return this.current;
  }

  /** Persists `cursor + count` and syncs it before updating the in-memory cursor. */
  async advance(count: number): Promise<number> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Checkpoint advance must be a non-negative integer, got ${count}`);
    }
    const next = this.current + count;
    await this.persist(next);
    this.current = next;
    return next;
  }

  async close(): Promise<void> {
    await io("close", this.filePath, () => this.handle.close());
  }

  private async persist(cursor: number): Promise<void> {
    const bytes = encodeCursor(cursor);
    await io("write", this.filePath, () => this.handle.write(bytes, 0, CHECKPOINT_BYTES, 0));
    await io("sync", this.filePath, () => this.handle.datasync());
  }
}
