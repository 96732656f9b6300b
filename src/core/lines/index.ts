/**
 * Line pipelines: record tokenizing, filter chains and AWK-style field
 * splitting over any byte source.
 *
 * @module lines
 */

export { awkFilter, DEFAULT_FIELD_PATTERN, splitFields } from "./awk";
export {
  FilterChain,
  grepBytes,
  grepPattern,
  grepText,
  mapBytes,
  mapBytesFallible,
  mapText,
  mapTextFallible,
} from "./filter-chain";
export { LineReader, newLineReader } from "./line-reader";
export {
  ConfigError,
  END_OF_STREAM,
  fail,
  type FilterSignal,
  isSignal,
  LineReaderOptionError,
  LinewiseError,
  OMIT_LINE,
  RecordTooLargeError,
  RecordTooLongError,
  SignalKind,
} from "./signals";
export { DEFAULT_CHUNK_SIZE, readChunks } from "./sources";
export { DEFAULT_MAX_RECORD_SIZE, RecordScanner, type ScanResult, scanRecord } from "./tokenizer";
export type {
  AwkCallback,
  AwkVars,
  ByteChunk,
  ByteReader,
  ByteSource,
  FilterFn,
  FilterOutcome,
  OverflowPolicy,
  ReadResult,
} from "./types";
