/**
 * Source adapters for line pipelines.
 *
 * Everything a LineReader can wrap (strings, byte arrays, Node readables,
 * async generators, other readers) is normalized into one async stream of
 * non-empty Uint8Array chunks.
 *
 * @module sources
 */

import type { ByteChunk, ByteReader, ByteSource } from "./types";

const encoder = new TextEncoder();

/** Read size used when pulling from a ByteReader. */
export const DEFAULT_CHUNK_SIZE = 4096;

function isAsyncIterable(source: ByteSource): source is AsyncIterable<ByteChunk> {
  return typeof source === "object" && Symbol.asyncIterator in source;
}

function isIterable(source: ByteSource): source is Iterable<ByteChunk> {
  return typeof source === "object" && Symbol.iterator in source;
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return encoder.encode(chunk);
  }
  throw new TypeError(`unsupported chunk type: ${chunk === null ? "null" : typeof chunk}`);
}

/**
 * Pull chunks from a ByteReader until it reports done.
 * Each yielded chunk is a copy; the read buffer is reused.
 */
async function* fromByteReader(reader: ByteReader, chunkSize: number): AsyncGenerator<Uint8Array> {
  const buffer = new Uint8Array(chunkSize);

  for (;;) {
    const { bytesRead, done } = await reader.read(buffer);
    if (bytesRead > 0) {
      yield buffer.slice(0, bytesRead);
    }
    if (done) {
      return;
    }
  }
}

/**
 * Normalize any supported source into a stream of non-empty byte chunks.
 * String chunks are UTF-8 encoded. Errors thrown by the source propagate
 * unchanged.
 *
 * Async iterables are preferred over `read()`, so wrapping another
 * LineReader consumes its records whole rather than through a fixed buffer.
 *
 * @param source - Input to normalize
 * @param chunkSize - Buffer size for ByteReader sources
 * @returns Async generator of chunks
 *
 * @example
 * ```typescript
 * for await (const chunk of readChunks(fs.createReadStream("access.log"))) {
 *   console.log(chunk.length);
 * }
 * ```
 */
export async function* readChunks(
  source: ByteSource,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): AsyncGenerator<Uint8Array> {
  if (typeof source === "string" || source instanceof Uint8Array) {
    const bytes = toBytes(source);
    if (bytes.length > 0) {
      yield bytes;
    }
    return;
  }

  if (isAsyncIterable(source)) {
    for await (const chunk of source) {
      const bytes = toBytes(chunk);
      if (bytes.length > 0) {
        yield bytes;
      }
    }
    return;
  }

  if (isIterable(source)) {
    for (const chunk of source) {
      const bytes = toBytes(chunk);
      if (bytes.length > 0) {
        yield bytes;
      }
    }
    return;
  }

  yield* fromByteReader(source, chunkSize);
}
