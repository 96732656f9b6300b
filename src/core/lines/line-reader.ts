/**
 * LineReader: a byte source that reads another byte source record by
 * record and runs every record through a chain of filters.
 *
 * Each pull is one step: scan the next record, bump NR, apply the chain,
 * hand the bytes to the caller. Filters are synchronous; only the source
 * is awaited. A reader must not be pulled from concurrently.
 *
 * @module line-reader
 */

import { Readable } from "node:stream";
import type { z } from "zod";
import {
  formatIssues,
  fieldPatternSchema,
  type LineReaderOptions,
  lineReaderOptionsSchema,
  separatorSchema,
} from "../../config/schema";
import { createLogger } from "../logging/logger";
import { awkFilter } from "./awk";
import {
  FilterChain,
  grepBytes,
  grepPattern,
  grepText,
  mapBytes,
  mapBytesFallible,
  mapText,
  mapTextFallible,
} from "./filter-chain";
import { type FilterSignal, isSignal, LineReaderOptionError, RecordTooLargeError, SignalKind } from "./signals";
import { RecordScanner } from "./tokenizer";
import type { AwkCallback, AwkVars, ByteReader, ByteSource, FilterFn, OverflowPolicy, ReadResult } from "./types";

const logger = createLogger("line-reader");

const EMPTY = new Uint8Array(0);
// Keep a leading U+FEFF: records must round-trip byte for byte
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

type PullResult = { done: true } | { done: false; record: Uint8Array };

type ReaderState = { kind: "open" } | { kind: "ended" } | { kind: "failed"; error: unknown };

function parseOption<S extends z.ZodTypeAny>(schema: S, value: unknown, name: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new LineReaderOptionError(`invalid ${name}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

function concat(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Line-by-line reader with a chainable filter pipeline.
 *
 * @example
 * ```typescript
 * const reader = new LineReader(fs.createReadStream("access.log"))
 *   .grepByPattern(/ 5\d\d /)
 *   .awk((line, fields, vars) => `${vars.NR}: ${fields[0]}`);
 *
 * for await (const record of reader) {
 *   process.stdout.write(record);
 * }
 * ```
 */
export class LineReader implements ByteReader, AsyncIterable<Uint8Array> {
  private readonly scanner: RecordScanner;
  private readonly chain = new FilterChain();
  private readonly awkVars: AwkVars;
  private readonly overflow: OverflowPolicy;
  private state: ReaderState = { kind: "open" };
  private omitted = 0;

  constructor(source: ByteSource, options: LineReaderOptions = {}) {
    const resolved = parseOption(lineReaderOptionsSchema, options, "options");

    this.awkVars = { NR: 0, NF: 0, RS: resolved.separator, FS: resolved.fieldPattern };
    this.overflow = resolved.overflow;
    this.scanner = new RecordScanner(source, () => this.awkVars.RS, resolved.maxRecordSize);

    logger.debug({
      event: "line_reader_created",
      separator: resolved.separator,
      fieldPattern: resolved.fieldPattern,
      maxRecordSize: resolved.maxRecordSize,
      overflow: resolved.overflow,
    });
  }

  /** Snapshot of the current AWK variables. */
  get vars(): Readonly<AwkVars> {
    return Object.freeze({ ...this.awkVars });
  }

  /** Set the record separator: a byte value or one ASCII character. */
  setRS(separator: number | string): this {
    this.awkVars.RS = parseOption(separatorSchema, separator, "separator");
    return this;
  }

  /** Set the field separator used by `awk`. */
  setFS(pattern: RegExp | string): this {
    this.awkVars.FS = parseOption(fieldPatternSchema, pattern, "field pattern");
    return this;
  }

  /** Append a canonical filter to the chain. */
  append(filter: FilterFn): this {
    this.chain.append(filter);
    return this;
  }

  map(fn: (record: Uint8Array) => Uint8Array): this {
    return this.append(mapBytes(fn));
  }

  /** Like `map`, but `fn` may return OMIT_LINE, END_OF_STREAM or `fail(error)`. */
  mapFallible(fn: (record: Uint8Array) => Uint8Array | FilterSignal): this {
    return this.append(mapBytesFallible(fn));
  }

  mapString(fn: (line: string) => string): this {
    return this.append(mapText(fn));
  }

  mapStringFallible(fn: (line: string) => string | FilterSignal): this {
    return this.append(mapTextFallible(fn));
  }

  /** Keep only records for which `predicate` is true. */
  grep(predicate: (record: Uint8Array) => boolean): this {
    return this.append(grepBytes(predicate));
  }

  grepString(predicate: (line: string) => boolean): this {
    return this.append(grepText(predicate));
  }

  grepByPattern(pattern: RegExp): this {
    return this.append(grepPattern(pattern));
  }

  /**
   * Process records AWK-style: `callback` receives the line without its
   * separator, its fields split on FS, and a snapshot of NR/NF/RS/FS.
   * The separator is put back unless the result already ends with it.
   */
  awk(callback: AwkCallback): this {
    return this.append(awkFilter(this.awkVars, callback));
  }

  /**
   * Read the next record into `buffer`.
   *
   * Resolves `{ bytesRead: 0, done: false }` for an omitted record and
   * `{ bytesRead: 0, done: true }` at end of stream. Hard errors from the
   * source or a filter reject verbatim, as do all later reads.
   */
  async read(buffer: Uint8Array): Promise<ReadResult> {
    const next = await this.pull();
    if (next.done) {
      return { bytesRead: 0, done: true };
    }

    const { record } = next;
    if (record.length > buffer.length) {
      if (this.overflow === "truncate") {
        buffer.set(record.subarray(0, buffer.length));
        return { bytesRead: buffer.length, done: false };
      }
      throw this.failWith(new RecordTooLargeError(record.length, buffer.length));
    }

    buffer.set(record);
    return { bytesRead: record.length, done: false };
  }

  /** Yield every non-empty output record; omitted records are skipped. */
  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    for (;;) {
      const next = await this.pull();
      if (next.done) {
        return;
      }
      if (next.record.length > 0) {
        yield next.record;
      }
    }
  }

  /** Expose the output as a Node byte stream, e.g. for `stream.pipeline`. */
  toStream(): Readable {
    return Readable.from(this, { objectMode: false });
  }

  /** Read everything, discarding output; for filters run for their side effects. */
  async discard(): Promise<void> {
    for (;;) {
      const next = await this.pull();
      if (next.done) {
        return;
      }
    }
  }

  /** Collect every output record. Terminal: installs a collecting filter. */
  async readAllSlice(): Promise<Uint8Array[]> {
    const result: Uint8Array[] = [];
    await this.map((record) => {
      result.push(record.slice());
      return EMPTY;
    }).discard();
    return result;
  }

  /** Collect all output bytes. */
  async readAll(): Promise<Uint8Array> {
    return concat(await this.readAllSlice());
  }

  async readAllSliceString(): Promise<string[]> {
    const result: string[] = [];
    await this.mapString((line) => {
      result.push(line);
      return "";
    }).discard();
    return result;
  }

  async readAllString(): Promise<string> {
    return decoder.decode(await this.readAll());
  }

  private async pull(): Promise<PullResult> {
    if (this.state.kind === "ended") {
      return { done: true };
    }
    if (this.state.kind === "failed") {
      throw this.state.error;
    }

    let record: Uint8Array | null;
    try {
      record = await this.scanner.next();
    } catch (error) {
      throw this.failWith(error);
    }

    if (record === null) {
      this.finish("input_exhausted");
      return { done: true };
    }

    this.awkVars.NR++;
    const outcome = this.chain.apply(record);
    if (!isSignal(outcome)) {
      return { done: false, record: outcome };
    }

    switch (outcome.kind) {
      case SignalKind.Omit:
        this.omitted++;
        return { done: false, record: EMPTY };
      case SignalKind.EndOfStream:
        this.finish("filter_requested_end");
        return { done: true };
      case SignalKind.Failure:
        throw this.failWith(outcome.error);
    }
  }

  private finish(reason: string): void {
    this.state = { kind: "ended" };
    logger.debug({ event: "line_reader_end", reason, records: this.awkVars.NR, omitted: this.omitted });
  }

  private failWith(error: unknown): unknown {
    this.state = { kind: "failed", error };
    logger.debug({ event: "line_reader_failed", records: this.awkVars.NR, error });
    return error;
  }
}

/** Wrap `source` in a new LineReader. */
export function newLineReader(source: ByteSource, options?: LineReaderOptions): LineReader {
  return new LineReader(source, options);
}
