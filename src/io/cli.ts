import { once } from "node:events";
import { createReadStream } from "node:fs";
import type { Writable } from "node:stream";
import { parseArgs } from "node:util";
import { loadConfig } from "../config/schema";
import { LineReader } from "../core/lines/line-reader";
import { ConfigError, LineReaderOptionError } from "../core/lines/signals";
import type { ByteSource } from "../core/lines/types";
import { createLogger, setLogLevel } from "../core/logging/logger";

const logger = createLogger("cli");

export interface CLIStreams {
  stdin: ByteSource;
  stdout: Writable;
  stderr: Writable;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function compilePattern(source: string, flag: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new LineReaderOptionError(`invalid ${flag} pattern ${JSON.stringify(source)}`, { cause: error });
  }
}

/** Parse a 1-based, comma-separated field list such as "1,3". */
export function parseFieldList(list: string): number[] {
  return list.split(",").map((part) => {
    const trimmed = part.trim();
    const index = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || index < 1) {
      throw new LineReaderOptionError(`invalid field number ${JSON.stringify(part)} in --fields`);
    }
    return index;
  });
}

async function write(out: Writable, chunk: Uint8Array | string): Promise<void> {
  if (!out.write(chunk)) {
    await once(out, "drain");
  }
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      separator: { type: "string", short: "R" },
      "field-pattern": { type: "string", short: "F" },
      grep: { type: "string", short: "g", multiple: true },
      exclude: { type: "string", short: "x", multiple: true },
      fields: { type: "string", short: "f" },
      ofs: { type: "string", short: "o", default: " " },
      number: { type: "boolean", short: "n", default: false },
      count: { type: "boolean", short: "c", default: false },
      config: { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: true,
  });
}

/**
 * Run the linewise command line. Returns the process exit code:
 * 0 on success, 1 when reading or a filter fails, 2 on bad usage or config.
 */
export async function runCLI(argv: string[], io: CLIStreams): Promise<number> {
  let args: ReturnType<typeof parse>;
  try {
    args = parse(argv);
  } catch (error) {
    io.stderr.write(`linewise: ${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write("Try 'linewise --help' for more information.\n");
    return EXIT_USAGE;
  }

  const { values, positionals } = args;
  if (values.help) {
    io.stdout.write(HELP);
    return EXIT_OK;
  }
  if (positionals.length > 1) {
    io.stderr.write("linewise: at most one input file may be given\n");
    return EXIT_USAGE;
  }

  let reader: LineReader;
  try {
    const config = await loadConfig(values.config);
    setLogLevel(values.verbose ? "debug" : config.logging.level);

    const input = positionals[0] ? createReadStream(positionals[0]) : io.stdin;
    reader = new LineReader(input, {
      ...config.reader,
      separator: values.separator ?? config.reader.separator,
      fieldPattern: values["field-pattern"] ?? config.reader.fieldPattern,
    });

    for (const pattern of values.grep ?? []) {
      reader.grepByPattern(compilePattern(pattern, "--grep"));
    }
    for (const pattern of values.exclude ?? []) {
      const excluded = compilePattern(pattern, "--exclude");
      reader.grepString((line) => !excluded.test(line));
    }

    const fieldList = values.fields === undefined ? undefined : parseFieldList(values.fields);
    if (fieldList || values.number) {
      reader.awk((line, fields, vars) => {
        const selected = fieldList ? fieldList.map((index) => fields[index - 1] ?? "").join(values.ofs) : line;
        return values.number ? `${vars.NR}\t${selected}` : selected;
      });
    }
  } catch (error) {
    if (error instanceof ConfigError || error instanceof LineReaderOptionError) {
      io.stderr.write(`linewise: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  logger.debug({ event: "cli_start", input: positionals[0] ?? "stdin" });

  try {
    let emitted = 0;
    if (values.count) {
      await reader
        .map((record) => {
          emitted++;
          return record;
        })
        .discard();
      await write(io.stdout, `${emitted}\n`);
    } else {
      for await (const record of reader) {
        emitted++;
        await write(io.stdout, record);
      }
    }

    logger.debug({ event: "cli_complete", records: reader.vars.NR, emitted });
    return EXIT_OK;
  } catch (error) {
    logger.error({ event: "cli_failed", records: reader.vars.NR, error });
    io.stderr.write(`linewise: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_FAILURE;
  }
}

const HELP = `
linewise - line-oriented filtering and field splitting

USAGE:
  linewise [OPTIONS] [FILE]
  cat FILE | linewise [OPTIONS]

OPTIONS:
  -R, --separator <char>      Record separator (default "\\n"; accepts \\n \\t \\r \\0)
  -F, --field-pattern <re>    Field separator regex (default "\\s+")
  -g, --grep <re>             Keep records matching <re> (repeatable, all must match)
  -x, --exclude <re>          Drop records matching <re> (repeatable)
  -f, --fields <list>         Print only these 1-based fields, e.g. "1,3"
  -o, --ofs <text>            Output field separator for --fields (default " ")
  -n, --number                Prefix each record with its record number and a tab
  -c, --count                 Print only the number of records emitted
      --config <path>         Configuration file (default ./linewise.json)
  -v, --verbose               Enable debug logging (stderr)
  -h, --help                  Show this help message

EXAMPLES:
  # Second column of every error line
  linewise -g ERROR -f 2 app.log

  # Count non-comment lines
  linewise -x '^#' -c settings.conf
`;
