/**
 * Core types for line pipelines.
 *
 * Key concepts:
 * 1. FilterFn - canonical per-record transformation (bytes in, bytes or signal out)
 * 2. AwkVars - per-reader record/field counters and separators
 * 3. ByteSource / ByteReader - what a reader can wrap, and what it exposes
 */

import type { FilterSignal } from "./signals";

/**
 * Outcome of a single filter: the record to pass on, or a signal
 * that stops the chain for this record.
 */
export type FilterOutcome = Uint8Array | FilterSignal;

/**
 * Canonical filter shape. Every adapter (map, grep, awk, ...) is
 * normalized to this before it is appended to the chain.
 *
 * @example
 * ```typescript
 * const dropBlank: FilterFn = (record) => (record.length <= 1 ? OMIT_LINE : record);
 * ```
 */
export type FilterFn = (record: Uint8Array) => FilterOutcome;

/** Variables in the AWK sense (see awk(1)). */
export interface AwkVars {
  /** Number of the current record, starting at 1 */
  NR: number;
  /** Field count of the most recently split record */
  NF: number;
  /** Record separator byte */
  RS: number;
  /** Field separator pattern */
  FS: RegExp;
}

export type AwkCallback = (line: string, fields: string[], vars: Readonly<AwkVars>) => string | FilterSignal;

export interface ReadResult {
  /** Bytes written into the caller's buffer */
  bytesRead: number;
  /** No further records will be produced */
  done: boolean;
}

/**
 * Pull-based byte source: fills the given buffer and reports how much was
 * written. `bytesRead` may be 0 while `done` is false.
 */
export interface ByteReader {
  read(buffer: Uint8Array): Promise<ReadResult>;
}

export type ByteChunk = Uint8Array | string;

/** Anything a LineReader can wrap. */
export type ByteSource = string | Uint8Array | AsyncIterable<ByteChunk> | Iterable<ByteChunk> | ByteReader;

/** What to do when a record does not fit the buffer passed to `read`. */
export type OverflowPolicy = "error" | "truncate";
