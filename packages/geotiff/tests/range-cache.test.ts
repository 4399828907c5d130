import { describe, expect, it } from "vitest";
import {
  InvalidRequestError,
  ShortReadError,
  TransportError,
} from "../src/errors.js";
import { RangeCache } from "../src/range-cache.js";
import { MemorySource, sequentialBytes, toArrayBuffer } from "./helpers.js";

function setup(length = 100, chunkSize = 10) {
  const source = new MemorySource(sequentialBytes(length));
  const cache = new RangeCache(source, { chunkSize });
  return { source, cache };
}

describe("RangeCache.readAt", () => {
  it("fetches each touched chunk once and serves repeats from memory", async () => {
    const { source, cache } = setup();

    const first = await cache.readAt(5, 20);
    expect(Array.from(first)).toEqual(Array.from({ length: 20 }, (_, i) => i + 5));
    expect(source.fetches).toEqual([
      { offset: 0, length: 11 },
      { offset: 10, length: 11 },
      { offset: 20, length: 11 },
    ]);

    const again = await cache.readAt(5, 20);
    expect(again).toEqual(first);
    expect(source.fetches).toHaveLength(3);
    expect(cache.cachedChunkCount).toBe(3);
  });

  it("reuses cached chunks for overlapping reads", async () => {
    const { source, cache } = setup();
    await cache.readAt(0, 10);
    await cache.readAt(8, 4);
    expect(source.fetches.map((f) => f.offset)).toEqual([0, 10]);
  });

  it("returns an empty buffer for zero-length reads without fetching", async () => {
    const { source, cache } = setup();
    const bytes = await cache.readAt(50, 0);
    expect(bytes.length).toBe(0);
    expect(source.fetches).toHaveLength(0);
  });

  it("lists aligned chunk keys in ascending order", () => {
    const { cache } = setup();
    expect(cache.chunkKeys(15, 20)).toEqual([10, 20, 30]);
    expect(cache.chunkKeys(10, 10)).toEqual([10]);
  });

  it("shares one in-flight fetch between concurrent reads", async () => {
    const { source, cache } = setup();
    const [a, b] = await Promise.all([cache.readAt(0, 5), cache.readAt(3, 4)]);
    expect(Array.from(a)).toEqual([0, 1, 2, 3, 4]);
    expect(Array.from(b)).toEqual([3, 4, 5, 6]);
    expect(source.fetches).toHaveLength(1);
  });

  it("reports a short read with the bytes that were available", async () => {
    const { cache } = setup();
    const err = await cache.readAt(95, 10).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ShortReadError);
    if (err instanceof ShortReadError) {
      expect(Array.from(err.bytes)).toEqual([95, 96, 97, 98, 99]);
      expect(err.requested).toBe(10);
    }
  });

  it("rejects negative offsets", async () => {
    const { cache } = setup();
    await expect(cache.readAt(-1, 4)).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("wraps transport failures and keeps chunks that did arrive", async () => {
    const { source, cache } = setup();
    source.failing.add(10);

    const err = await cache.readAt(0, 15).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toHaveProperty("cause");

    source.failing.clear();
    const bytes = await cache.readAt(0, 15);
    expect(bytes[14]).toBe(14);
    expect(source.fetches.map((f) => f.offset)).toEqual([0, 10, 10]);
  });

  it("rejects a non-positive chunk size", () => {
    const source = new MemorySource(sequentialBytes(10));
    expect(() => new RangeCache(source, { chunkSize: 0 })).toThrow(/positive integer/);
  });
});

describe("RangeCache.read and seek", () => {
  it("advances the cursor by the bytes read", async () => {
    const { cache } = setup();
    const buffer = new Uint8Array(4);

    expect(await cache.read(buffer)).toBe(4);
    expect(Array.from(buffer)).toEqual([0, 1, 2, 3]);
    expect(await cache.read(buffer)).toBe(4);
    expect(Array.from(buffer)).toEqual([4, 5, 6, 7]);
    expect(cache.position).toBe(8);
  });

  it("copies partial bytes and advances on a short read", async () => {
    const { cache } = setup();
    await cache.seek(98);
    const buffer = new Uint8Array(4);

    await expect(cache.read(buffer)).rejects.toBeInstanceOf(ShortReadError);
    expect(Array.from(buffer.subarray(0, 2))).toEqual([98, 99]);
    expect(cache.position).toBe(100);
  });

  it("seeks relative to the current position", async () => {
    const { cache } = setup();
    await cache.seek(40);
    expect(await cache.seek(-5, "current")).toBe(35);
  });

  it("seeks from the end using one size probe", async () => {
    const { source, cache } = setup();
    expect(await cache.seek(-10, "end")).toBe(90);
    expect(await cache.seek(-5, "end")).toBe(95);
    expect(source.heads).toBe(1);
  });

  it("rejects a negative target without moving the cursor", async () => {
    const { cache } = setup();
    await cache.seek(30);
    await expect(cache.seek(-5, "start")).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(cache.seek(-200, "end")).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(cache.seek(-31, "current")).rejects.toBeInstanceOf(InvalidRequestError);
    expect(cache.position).toBe(30);
  });
});

describe("RangeCache.fromArrayBuffer", () => {
  it("serves reads from an in-memory buffer", async () => {
    const cache = RangeCache.fromArrayBuffer(toArrayBuffer(sequentialBytes(100)), {
      chunkSize: 16,
    });
    const bytes = await cache.readAt(20, 8);
    expect(Array.from(bytes)).toEqual([20, 21, 22, 23, 24, 25, 26, 27]);
  });
});
