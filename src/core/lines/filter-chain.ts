/**
 * Ordered per-record filter chain, plus the adapters that turn the
 * convenience callback shapes into canonical FilterFns.
 *
 * @module filter-chain
 */

import { fail, isSignal, OMIT_LINE } from "./signals";
import type { FilterSignal } from "./signals";
import type { FilterFn, FilterOutcome } from "./types";

const encoder = new TextEncoder();
// Keep a leading U+FEFF: records must round-trip byte for byte
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

export class FilterChain {
  private readonly filters: FilterFn[] = [];

  get length(): number {
    return this.filters.length;
  }

  append(filter: FilterFn): void {
    this.filters.push(filter);
  }

  /**
   * Run `record` through every filter in registration order.
   * The first signal stops the chain and is returned as is; a filter that
   * throws is treated as a Failure carrying the thrown value.
   */
  apply(record: Uint8Array): FilterOutcome {
    let current = record;

    for (const filter of this.filters) {
      let outcome: FilterOutcome;
      try {
        outcome = filter(current);
      } catch (error) {
        return fail(error);
      }

      if (isSignal(outcome)) {
        return outcome;
      }
      current = outcome;
    }

    return current;
  }
}

export function mapBytes(fn: (record: Uint8Array) => Uint8Array): FilterFn {
  return (record) => fn(record);
}

export function mapBytesFallible(fn: (record: Uint8Array) => Uint8Array | FilterSignal): FilterFn {
  return (record) => fn(record);
}

export function mapText(fn: (line: string) => string): FilterFn {
  return (record) => encoder.encode(fn(decoder.decode(record)));
}

export function mapTextFallible(fn: (line: string) => string | FilterSignal): FilterFn {
  return (record) => {
    const result = fn(decoder.decode(record));
    return isSignal(result) ? result : encoder.encode(result);
  };
}

export function grepBytes(predicate: (record: Uint8Array) => boolean): FilterFn {
  return (record) => (predicate(record) ? record : OMIT_LINE);
}

export function grepText(predicate: (line: string) => boolean): FilterFn {
  return grepBytes((record) => predicate(decoder.decode(record)));
}

/**
 * Keep records whose decoded text matches `pattern`. The record keeps its
 * separator, so `$` anchors must allow for it.
 */
export function grepPattern(pattern: RegExp): FilterFn {
  return grepText((line) => {
    // global/sticky patterns carry lastIndex between calls
    pattern.lastIndex = 0;
    return pattern.test(line);
  });
}
