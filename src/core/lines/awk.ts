/**
 * AWK-style record processing: field splitting on top of the filter chain.
 *
 * @module awk
 */

import { isSignal } from "./signals";
import type { AwkCallback, AwkVars, FilterFn } from "./types";

const encoder = new TextEncoder();
// Keep a leading U+FEFF: records must round-trip byte for byte
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

/** Default field separator: one or more whitespace characters. */
export const DEFAULT_FIELD_PATTERN = /\s+/;

/**
 * Split `line` on every match of `pattern`, without a limit.
 *
 * Unlike `String.prototype.split`, capture groups are not spliced into the
 * result, and an empty match directly after a previous match is ignored.
 * A leading match yields a leading empty field; an empty line yields `[""]`.
 *
 * @example
 * ```typescript
 * splitFields("a b  c", /\s+/); // ["a", "b", "c"]
 * splitFields(" a", /\s+/); // ["", "a"]
 * splitFields("a,b;c", /([,;])/); // ["a", "b", "c"]
 * ```
 */
export function splitFields(line: string, pattern: RegExp): string[] {
  if (line.length === 0) {
    return [""];
  }

  const flags = pattern.flags.replace(/[gy]/g, "");
  const matcher = new RegExp(pattern.source, `${flags}g`);
  const fields: string[] = [];
  let begin = 0;
  let end = 0;
  let previousMatchEnd = -1;

  for (let match = matcher.exec(line); match !== null; match = matcher.exec(line)) {
    const matchStart = match.index;
    const matchEnd = matchStart + match[0].length;

    if (match[0].length === 0) {
      // Step over a whole code point, never half a surrogate pair
      const codePoint = line.codePointAt(matchEnd) ?? 0;
      matcher.lastIndex = matchEnd + (codePoint > 0xffff ? 2 : 1);
      if (matchEnd === previousMatchEnd) {
        continue;
      }
    }
    previousMatchEnd = matchEnd;

    end = matchStart;
    if (matchEnd !== 0) {
      fields.push(line.slice(begin, end));
    }
    begin = matchEnd;

    if (matcher.lastIndex > line.length) {
      break;
    }
  }

  if (end !== line.length) {
    fields.push(line.slice(begin));
  }

  return fields;
}

/**
 * Build the filter behind `LineReader.awk`.
 *
 * A trailing RS is stripped before splitting and re-appended to the
 * callback's result unless the result already ends with RS. `vars` is the
 * reader's live state; NF is updated here and the callback gets a frozen copy.
 */
export function awkFilter(vars: AwkVars, callback: AwkCallback): FilterFn {
  return (record) => {
    const separator = vars.RS;
    const terminated = record.length > 0 && record[record.length - 1] === separator;
    const line = decoder.decode(terminated ? record.subarray(0, record.length - 1) : record);

    const fields = splitFields(line, vars.FS);
    vars.NF = fields.length;

    const result = callback(line, fields, Object.freeze({ ...vars }));
    if (isSignal(result)) {
      return result;
    }

    const output = encoder.encode(result);
    if (!terminated || (output.length > 0 && output[output.length - 1] === separator)) {
      return output;
    }

    const withSeparator = new Uint8Array(output.length + 1);
    withSeparator.set(output);
    withSeparator[output.length] = separator;
    return withSeparator;
  };
}
