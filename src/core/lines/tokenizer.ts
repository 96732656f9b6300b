/**
 * Record tokenizer: cuts a byte stream into records on a single-byte
 * separator.
 *
 * `scanRecord` is the pure boundary decision; `RecordScanner` owns the
 * buffer and feeds it from a source.
 *
 * @module tokenizer
 */

import { readChunks } from "./sources";
import { RecordTooLongError } from "./signals";
import type { ByteSource } from "./types";

export type ScanResult =
  | { kind: "record"; advance: number; record: Uint8Array }
  | { kind: "more" }
  | { kind: "end" };

/** Default record length limit, separator included (64 KiB). */
export const DEFAULT_MAX_RECORD_SIZE = 64 * 1024;

const INITIAL_BUFFER_SIZE = 4096;

/**
 * Decide the next record boundary in `data`.
 *
 * - separator found: the record runs through the separator (inclusive)
 * - no separator, at EOF, data left: the rest is a final, unterminated record
 * - at EOF with nothing left: end (empty input yields no records)
 * - otherwise: more input is needed
 *
 * The returned record is a view into `data`, not a copy.
 */
export function scanRecord(data: Uint8Array, atEof: boolean, separator: number): ScanResult {
  if (atEof && data.length === 0) {
    return { kind: "end" };
  }

  const index = data.indexOf(separator);
  if (index >= 0) {
    return { kind: "record", advance: index + 1, record: data.subarray(0, index + 1) };
  }

  if (atEof) {
    return { kind: "record", advance: data.length, record: data };
  }

  return { kind: "more" };
}

/**
 * Buffered scanner over a ByteSource.
 *
 * Unconsumed bytes live in `buffer[start, end)`. Records are sliced from the
 * front; before growing, pending bytes are moved back to offset 0.
 */
export class RecordScanner {
  private buffer = new Uint8Array(INITIAL_BUFFER_SIZE);
  private start = 0;
  private end = 0;
  private eof = false;
  private readonly chunks: AsyncIterator<Uint8Array>;

  /**
   * @param source - Input bytes
   * @param separator - Read before every scan, so separator changes apply to the next record
   * @param maxRecordSize - Longest record allowed, separator included
   */
  constructor(
    source: ByteSource,
    private readonly separator: () => number,
    private readonly maxRecordSize: number = DEFAULT_MAX_RECORD_SIZE,
  ) {
    this.chunks = readChunks(source);
  }

  /**
   * Next record (a copy owned by the caller), or null once input is exhausted.
   * Source errors propagate unchanged.
   */
  async next(): Promise<Uint8Array | null> {
    for (;;) {
      const result = scanRecord(this.buffer.subarray(this.start, this.end), this.eof, this.separator());

      if (result.kind === "record") {
        if (result.advance > this.maxRecordSize) {
          throw new RecordTooLongError(this.maxRecordSize);
        }
        this.start += result.advance;
        return result.record.slice();
      }
      if (result.kind === "end") {
        return null;
      }

      if (this.end - this.start > this.maxRecordSize) {
        throw new RecordTooLongError(this.maxRecordSize);
      }
      await this.fill();
    }
  }

  private async fill(): Promise<void> {
    const { value, done } = await this.chunks.next();
    if (done) {
      this.eof = true;
      return;
    }
    this.append(value);
  }

  private append(chunk: Uint8Array): void {
    const pending = this.end - this.start;

    if (this.end + chunk.length > this.buffer.length) {
      if (pending + chunk.length <= this.buffer.length) {
        this.buffer.copyWithin(0, this.start, this.end);
      } else {
        const grown = new Uint8Array(Math.max(this.buffer.length * 2, pending + chunk.length));
        grown.set(this.buffer.subarray(this.start, this.end));
        this.buffer = grown;
      }
      this.start = 0;
      this.end = pending;
    }

    this.buffer.set(chunk, this.end);
    this.end += chunk.length;
  }
}
