import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IoError } from "../errors.js";
import { VectorStore, decodeEmbeddings, encodeEmbeddings, recordSize } from "../vector-store.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

describe("encodeEmbeddings", () => {
  it("writes little-endian float32 records back to back", () => {
    const bytes = encodeEmbeddings([Float32Array.from([1, -2]), Float32Array.from([0.5, 0])], 2);
    expect([...bytes]).toEqual([
      0x00, 0x00, 0x80, 0x3f, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x3f, 0x00, 0x00, 0x00, 0x00,
    ]);
  });

  it("rejects an embedding of the wrong dimension", () => {
    expect(() => encodeEmbeddings([Float32Array.from([1, 2, 3])], 2)).toThrow(RangeError);
  });

  it("derives record size from dimensions alone", () => {
    expect(recordSize(1536)).toBe(6144);
  });
});

describe("VectorStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    filePath = path.join(dir, "vectors");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("creates the file when it does not exist", async () => {
    const store = await VectorStore.open(filePath, 3);
    expect(await store.recordCount()).toBe(0);
    await store.close();
    expect((await stat(filePath)).size).toBe(0);
  });

  it("reads back bit-identical records at the written offset", async () => {
    const embeddings = [Float32Array.from([0.1, -3.25, 1e-7]), Float32Array.from([-0, 42, 7.5])];
    const store = await VectorStore.open(filePath, 3);
    await store.write(3, embeddings);

    expect(await store.recordCount()).toBe(5);
    const read = await store.read(3, 2);
    expect(read.map((e) => Buffer.from(e.buffer).toString("hex"))).toEqual(
      embeddings.map((e) => Buffer.from(e.buffer).toString("hex")),
    );
    await store.close();

    const onDisk = await readFile(filePath);
    expect(onDisk.length).toBe(5 * 12);
    expect(decodeEmbeddings(onDisk.subarray(36), 3)).toEqual(read);
  });

  it("overwrites a batch in place when rewritten at the same index", async () => {
    const store = await VectorStore.open(filePath, 2);
    await store.write(0, [Float32Array.from([1, 1]), Float32Array.from([2, 2])]);
    await store.write(1, [Float32Array.from([9, 9])]);

    expect(await store.recordCount()).toBe(2);
    expect(await store.read(0, 2)).toEqual([Float32Array.from([1, 1]), Float32Array.from([9, 9])]);
    await store.close();
  });

  it("writes nothing when a batch fails to encode", async () => {
    const store = await VectorStore.open(filePath, 2);
    await expect(
      store.write(0, [Float32Array.from([1, 2]), Float32Array.from([3])]),
    ).rejects.toThrow(RangeError);
    expect(await store.recordCount()).toBe(0);
    await store.close();
  });

  it("fails a read past the end of the file", async () => {
    const store = await VectorStore.open(filePath, 2);
    await store.write(0, [Float32Array.from([1, 2])]);
    await expect(store.read(0, 2)).rejects.toBeInstanceOf(IoError);
    await store.close();
  });

  it("reports an unopenable path as an IoError", async () => {
    await expect(VectorStore.open(path.join(dir, "missing", "vectors"), 2)).rejects.toMatchObject({
      code: "io_error",
      operation: "open",
    });
  });
});
