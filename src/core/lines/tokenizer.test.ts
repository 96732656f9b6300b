import { describe, expect, test } from "vitest";
import { RecordTooLongError } from "./signals";
import { RecordScanner, scanRecord } from "./tokenizer";

const NL = 0x0a;
const encoder = new TextEncoder();
const decoder = new TextDecoder();

async function scanAll(source: Iterable<string> | string, separator = NL, maxRecordSize?: number): Promise<string[]> {
  const scanner = new RecordScanner(source, () => separator, maxRecordSize);
  const records: string[] = [];
  for (let record = await scanner.next(); record !== null; record = await scanner.next()) {
    records.push(decoder.decode(record));
  }
  return records;
}

describe("scanRecord", () => {
  test("returns the record through the first separator", () => {
    const result = scanRecord(encoder.encode("ab\ncd\n"), false, NL);
    expect(result.kind).toBe("record");
    if (result.kind === "record") {
      expect(result.advance).toBe(3);
      expect(decoder.decode(result.record)).toBe("ab\n");
    }
  });

  test("asks for more input when no separator is buffered", () => {
    expect(scanRecord(encoder.encode("partial"), false, NL)).toEqual({ kind: "more" });
    expect(scanRecord(new Uint8Array(0), false, NL)).toEqual({ kind: "more" });
  });

  test("returns the unterminated remainder at EOF", () => {
    const result = scanRecord(encoder.encode("tail"), true, NL);
    expect(result.kind).toBe("record");
    if (result.kind === "record") {
      expect(result.advance).toBe(4);
      expect(decoder.decode(result.record)).toBe("tail");
    }
  });

  test("ends on empty data at EOF", () => {
    expect(scanRecord(new Uint8Array(0), true, NL)).toEqual({ kind: "end" });
  });

  test("a leading separator is a record on its own", () => {
    const result = scanRecord(encoder.encode("\nx"), false, NL);
    expect(result.kind === "record" && Array.from(result.record)).toEqual([NL]);
  });

  test("uses the given separator byte", () => {
    const result = scanRecord(encoder.encode("a,b"), false, 0x2c);
    expect(result.kind === "record" && decoder.decode(result.record)).toBe("a,");
  });
});

describe("RecordScanner", () => {
  test("yields N records for N separators and no tail", async () => {
    expect(await scanAll("a\nb\nc\n")).toEqual(["a\n", "b\n", "c\n"]);
  });

  test("yields N+1 records when the tail is non-empty", async () => {
    expect(await scanAll("a\nb\nc")).toEqual(["a\n", "b\n", "c"]);
  });

  test("yields no records for empty input", async () => {
    expect(await scanAll("")).toEqual([]);
    expect(await scanAll([])).toEqual([]);
  });

  test("joins records split across chunks", async () => {
    expect(await scanAll(["fo", "o\nb", "ar", "\n", "baz"])).toEqual(["foo\n", "bar\n", "baz"]);
  });

  test("keeps empty records between consecutive separators", async () => {
    expect(await scanAll("\n\nx\n")).toEqual(["\n", "\n", "x\n"]);
  });

  test("grows its buffer for records longer than the initial size", async () => {
    const long = "x".repeat(10_000);
    const chunks = [long.slice(0, 3000), long.slice(3000, 7000), `${long.slice(7000)}\nend`];
    const records = await scanAll(chunks);
    expect(records).toHaveLength(2);
    expect(records[0]).toBe(`${long}\n`);
    expect(records[1]).toBe("end");
  });

  test("returns copies that survive later reads", async () => {
    const scanner = new RecordScanner(["one\ntwo\n", "three\n"], () => NL);
    const first = await scanner.next();
    await scanner.next();
    await scanner.next();
    expect(first && decoder.decode(first)).toBe("one\n");
  });

  test("reads the separator before every scan", async () => {
    let separator = NL;
    const scanner = new RecordScanner("a\nb;c;", () => separator);
    const first = await scanner.next();
    separator = 0x3b;
    const second = await scanner.next();
    const third = await scanner.next();
    expect([first, second, third].map((record) => record && decoder.decode(record))).toEqual(["a\n", "b;", "c;"]);
  });

  test("fails when a record exceeds the limit", async () => {
    const scanner = new RecordScanner(["abcdefgh", "ijkl\n"], () => NL, 8);
    await expect(scanner.next()).rejects.toBeInstanceOf(RecordTooLongError);
  });

  test("applies the limit the same way however the input is chunked", async () => {
    const twoChunks = new RecordScanner(["aaaaaa", "aaaaaa\n"], () => NL, 8);
    const threeChunks = new RecordScanner(["aaaa", "aaaa", "aaaa\n"], () => NL, 8);
    await expect(twoChunks.next()).rejects.toBeInstanceOf(RecordTooLongError);
    await expect(threeChunks.next()).rejects.toBeInstanceOf(RecordTooLongError);
  });

  test("accepts records of exactly the limit", async () => {
    expect(await scanAll(["aaaa", "aaa\n"], NL, 8)).toEqual(["aaaaaaa\n"]);
    expect(await scanAll(["aaaa", "aaaa"], NL, 8)).toEqual(["aaaaaaaa"]);
  });

  test("accepts a record that fits under the limit", async () => {
    expect(await scanAll(["abc", "def\n"], NL, 8)).toEqual(["abcdef\n"]);
  });

  test("keeps returning null after the end", async () => {
    const scanner = new RecordScanner("x", () => NL);
    expect(await scanner.next()).not.toBeNull();
    expect(await scanner.next()).toBeNull();
    expect(await scanner.next()).toBeNull();
  });

  test("propagates source errors unchanged", async () => {
    const boom = new Error("disk gone");
    async function* source() {
      yield "ok\n";
      throw boom;
    }
    const scanner = new RecordScanner(source(), () => NL);
    const first = await scanner.next();
    expect(first && decoder.decode(first)).toBe("ok\n");
    await expect(scanner.next()).rejects.toBe(boom);
  });
});
