import { SourceHttp } from "@chunkd/source-http";
import { SourceMemory } from "@chunkd/source-memory";
import { InvalidRequestError, ShortReadError, TransportError } from "./errors.js";

/** Options accepted by every read that may hit the network. */
export type ReadOptions = {
  /** AbortSignal to cancel the read. */
  signal?: AbortSignal;
};

/**
 * The remote file as seen by the cache.
 *
 * Structurally satisfied by the `@chunkd` sources (`SourceHttp`,
 * `SourceMemory`).
 */
export interface ChunkSource {
  readonly url: URL;

  /** Fetch `length` bytes starting at `offset`. */
  fetch(
    offset: number,
    length?: number,
    options?: ReadOptions,
  ): Promise<ArrayBuffer>;

  /** Metadata-only request, e.g. an HTTP HEAD. */
  head(options?: ReadOptions): Promise<{ size?: number }>;
}

/** Anything that can serve random-access reads. */
export interface ByteSource {
  readAt(offset: number, length: number, options?: ReadOptions): Promise<Uint8Array>;
}

export type RangeCacheOptions = {
  /** Size of one aligned chunk in bytes. */
  chunkSize?: number;
  /** Abort a chunk fetch that takes longer than this many milliseconds. */
  timeoutMs?: number;
};

export type Whence = "start" | "current" | "end";

export const DEFAULT_CHUNK_SIZE = 4000;

/**
 * Random-access reader over an immutable remote file.
 *
 * Reads are served from fixed-size chunks aligned on multiples of
 * `chunkSize`. Every chunk is fetched at most once and kept for the lifetime
 * of the cache; nothing is evicted.
 *
 * One instance belongs to one decode session. Concurrent reads are safe:
 * reads of the same missing chunk share a single in-flight fetch.
 */
export class RangeCache implements ByteSource {
  readonly source: ChunkSource;
  readonly chunkSize: number;
  readonly timeoutMs: number | null;

  private readonly chunks = new Map<number, Uint8Array>();
  private readonly inflight = new Map<number, Promise<Uint8Array>>();
  private cursor = 0;
  private size: number | null = null;

  constructor(
    source: ChunkSource,
    { chunkSize = DEFAULT_CHUNK_SIZE, timeoutMs }: RangeCacheOptions = {},
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.source = source;
    this.chunkSize = chunkSize;
    this.timeoutMs = timeoutMs ?? null;
  }

  /** Read a remote file over HTTP range requests. */
  static fromUrl(url: string | URL, options?: RangeCacheOptions): RangeCache {
    return new RangeCache(new SourceHttp(url), options);
  }

  /** Serve reads from bytes already in memory. */
  static fromArrayBuffer(
    input: ArrayBuffer,
    options?: RangeCacheOptions,
  ): RangeCache {
    return new RangeCache(new SourceMemory("memory://input.tif", input), options);
  }

  /** Current cursor used by `read`. */
  get position(): number {
    return this.cursor;
  }

  /** Number of chunks held in memory. */
  get cachedChunkCount(): number {
    return this.chunks.size;
  }

  /** Aligned chunk keys intersecting `[offset, offset + length)`, ascending. */
  chunkKeys(offset: number, length: number): number[] {
    const keys: number[] = [];
    const end = offset + length;
    for (
      let key = this.chunkSize * Math.floor(offset / this.chunkSize);
      key < end;
      key += this.chunkSize
    ) {
      keys.push(key);
    }
    return keys;
  }

  /**
   * Read exactly `length` bytes at `offset`.
   *
   * Throws {@link ShortReadError}, carrying the bytes that were available,
   * when the file ends before `offset + length`.
   */
  async readAt(
    offset: number,
    length: number,
    options: ReadOptions = {},
  ): Promise<Uint8Array> {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidRequestError(`invalid read offset: ${offset}`);
    }
    if (!Number.isInteger(length) || length < 0) {
      throw new InvalidRequestError(`invalid read length: ${length}`);
    }

    const output = new Uint8Array(length);
    if (length === 0) {
      return output;
    }

    const keys = this.chunkKeys(offset, length);
    const chunks = await Promise.all(
      keys.map((key) => this.chunk(key, options)),
    );

    const end = offset + length;
    let written = 0;
    for (const [i, key] of keys.entries()) {
      const chunk = chunks[i]!;
      const start = Math.max(offset, key) - key;
      const stop = Math.min(end, key + this.chunkSize) - key;
      const available = chunk.subarray(start, Math.min(stop, chunk.length));
      output.set(available, written);
      written += available.length;

      if (available.length < stop - start) {
        throw new ShortReadError(offset, length, output.slice(0, written));
      }
    }

    return output;
  }

  /**
   * Read into `buffer` from the cursor and advance it by the bytes read.
   *
   * On a short read the available bytes are still copied and the cursor
   * still advances before the error is rethrown.
   */
  async read(buffer: Uint8Array, options?: ReadOptions): Promise<number> {
    try {
      const bytes = await this.readAt(this.cursor, buffer.length, options);
      buffer.set(bytes);
      this.cursor += bytes.length;
      return bytes.length;
    } catch (err) {
      if (err instanceof ShortReadError) {
        buffer.set(err.bytes);
        this.cursor += err.bytes.length;
      }
      throw err;
    }
  }

  /**
   * Move the cursor and return its new absolute position.
   *
   * Seeking from the end probes the file size first. A negative result is
   * rejected and leaves the cursor where it was.
   */
  async seek(offset: number, whence: Whence = "start"): Promise<number> {
    let target: number;
    switch (whence) {
      case "start":
        target = offset;
        break;
      case "current":
        target = this.cursor + offset;
        break;
      case "end":
        target = (await this.probeSize()) + offset;
        break;
    }

    if (target < 0) {
      throw new InvalidRequestError(`seek to negative offset ${target}`);
    }
    this.cursor = target;
    return target;
  }

  /** Total file size from a metadata-only request. */
  async probeSize(options: ReadOptions = {}): Promise<number> {
    if (this.size !== null) {
      return this.size;
    }

    let size: number | undefined;
    try {
      ({ size } = await this.source.head(this.requestOptions(options)));
    } catch (err) {
      throw new TransportError(`size probe failed for ${this.source.url}`, {
        cause: err,
      });
    }
    if (size == null) {
      throw new TransportError(`no content length for ${this.source.url}`);
    }

    this.size = size;
    return size;
  }

  private chunk(key: number, options: ReadOptions): Promise<Uint8Array> {
    const cached = this.chunks.get(key);
    if (cached) {
      return Promise.resolve(cached);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.fetchChunk(key, options).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, request);
    return request;
  }

  private async fetchChunk(key: number, options: ReadOptions): Promise<Uint8Array> {
    let buffer: ArrayBuffer;
    try {
      // One byte past the chunk: the HTTP source turns this into
      // `Range: bytes=key-(key+chunkSize)`.
      buffer = await this.source.fetch(
        key,
        this.chunkSize + 1,
        this.requestOptions(options),
      );
    } catch (err) {
      throw new TransportError(
        `fetch of bytes ${key}-${key + this.chunkSize} failed for ${this.source.url}`,
        { cause: err },
      );
    }

    const bytes = new Uint8Array(buffer);
    this.chunks.set(key, bytes);
    return bytes;
  }

  private requestOptions({ signal }: ReadOptions): ReadOptions {
    if (signal) {
      return { signal };
    }
    if (this.timeoutMs !== null) {
      return { signal: AbortSignal.timeout(this.timeoutMs) };
    }
    return {};
  }
}
