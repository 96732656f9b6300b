import { describe, expect, test, vi } from "vitest";
import {
  FilterChain,
  grepBytes,
  grepPattern,
  grepText,
  mapBytes,
  mapText,
  mapTextFallible,
} from "./filter-chain";
import { END_OF_STREAM, fail, isSignal, OMIT_LINE, SignalKind } from "./signals";
import type { FilterOutcome } from "./types";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function text(outcome: FilterOutcome): string {
  if (isSignal(outcome)) {
    throw new Error(`expected a record, got signal ${outcome.kind}`);
  }
  return decoder.decode(outcome);
}

describe("FilterChain", () => {
  test("returns the record unchanged when empty", () => {
    const chain = new FilterChain();
    expect(text(chain.apply(encoder.encode("same\n")))).toBe("same\n");
    expect(chain.length).toBe(0);
  });

  test("applies filters in registration order", () => {
    const chain = new FilterChain();
    chain.append(mapText((line) => `${line.trimEnd()}-f\n`));
    chain.append(mapText((line) => `${line.trimEnd()}-g\n`));
    expect(text(chain.apply(encoder.encode("r\n")))).toBe("r-f-g\n");
  });

  test("[f, g] equals g(f(R))", () => {
    const f = mapText((line) => line.toUpperCase());
    const g = mapText((line) => line.replace("A", "_"));
    const chain = new FilterChain();
    chain.append(f);
    chain.append(g);

    const record = encoder.encode("banana\n");
    const fOut = f(record);
    if (isSignal(fOut)) throw new Error("unexpected signal");
    expect(text(chain.apply(record))).toBe(text(g(fOut)));
    expect(text(chain.apply(record))).toBe("B_NANA\n");
  });

  test("stops at omit and skips later filters", () => {
    const later = vi.fn((line: string) => line);
    const chain = new FilterChain();
    chain.append(grepText(() => false));
    chain.append(mapText(later));

    expect(chain.apply(encoder.encode("x\n"))).toBe(OMIT_LINE);
    expect(later).not.toHaveBeenCalled();
  });

  test("passes end-of-stream through", () => {
    const chain = new FilterChain();
    chain.append(mapTextFallible(() => END_OF_STREAM));
    expect(chain.apply(encoder.encode("x\n"))).toBe(END_OF_STREAM);
  });

  test("returns hard errors as failure signals", () => {
    const error = new Error("bad record");
    const chain = new FilterChain();
    chain.append(mapTextFallible(() => fail(error)));
    expect(chain.apply(encoder.encode("x\n"))).toEqual({ kind: SignalKind.Failure, error });
  });

  test("turns a thrown error into a failure signal", () => {
    const error = new Error("thrown");
    const chain = new FilterChain();
    chain.append(() => {
      throw error;
    });
    expect(chain.apply(encoder.encode("x\n"))).toEqual({ kind: SignalKind.Failure, error });
  });
});

describe("adapters", () => {
  test("mapBytes passes bytes through", () => {
    const filter = mapBytes((record) => record.subarray(1));
    expect(text(filter(encoder.encode("abc")))).toBe("bc");
  });

  test("mapText converts between bytes and text", () => {
    const filter = mapText((line) => line.toUpperCase());
    expect(text(filter(encoder.encode("abc\n")))).toBe("ABC\n");
  });

  test("mapText round-trips multi-byte characters", () => {
    const filter = mapText((line) => `${line.trimEnd()}!\n`);
    expect(text(filter(encoder.encode("héllo\n")))).toBe("héllo!\n");
  });

  test("grepBytes keeps the same record when the predicate holds", () => {
    const record = encoder.encode("keep\n");
    expect(grepBytes(() => true)(record)).toBe(record);
    expect(grepBytes(() => false)(record)).toBe(OMIT_LINE);
  });

  test("grepPattern matches decoded text including the separator", () => {
    const filter = grepPattern(/^err/);
    expect(text(filter(encoder.encode("error: x\n")))).toBe("error: x\n");
    expect(filter(encoder.encode("info: x\n"))).toBe(OMIT_LINE);
  });

  test("grepPattern is not affected by a global pattern's lastIndex", () => {
    const filter = grepPattern(/a/g);
    expect(isSignal(filter(encoder.encode("a\n")))).toBe(false);
    expect(isSignal(filter(encoder.encode("a\n")))).toBe(false);
  });
});

describe("isSignal", () => {
  test("recognizes signals only", () => {
    expect(isSignal(OMIT_LINE)).toBe(true);
    expect(isSignal(END_OF_STREAM)).toBe(true);
    expect(isSignal(fail("x"))).toBe(true);
    expect(isSignal(new Uint8Array(0))).toBe(false);
    expect(isSignal({ kind: "OTHER" })).toBe(false);
    expect(isSignal(null)).toBe(false);
  });
});
