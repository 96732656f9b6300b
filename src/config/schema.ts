import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_FIELD_PATTERN } from "../core/lines/awk";
import { ConfigError } from "../core/lines/signals";
import { DEFAULT_MAX_RECORD_SIZE } from "../core/lines/tokenizer";

const SEPARATOR_ESCAPES: Record<string, string> = {
  "\\n": "\n",
  "\\t": "\t",
  "\\r": "\r",
  "\\0": "\0",
};

/**
 * Record separator: a byte value, or one ASCII character (escapes `\n`,
 * `\t`, `\r` and `\0` are accepted for config files and flags).
 * Always resolves to a byte value.
 */
export const separatorSchema = z.union([
  z.number().int().min(0).max(255),
  z.string().transform((value, ctx) => {
    const char = SEPARATOR_ESCAPES[value] ?? value;
    if (char.length !== 1 || char.charCodeAt(0) > 0x7f) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `separator must be a single ASCII character or a byte value 0-255, got ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return char.charCodeAt(0);
  }),
]);

export const fieldPatternSchema = z.union([
  z.instanceof(RegExp),
  z
    .string()
    .min(1)
    .transform((source, ctx) => {
      try {
        return new RegExp(source);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid field pattern: ${error instanceof Error ? error.message : String(error)}`,
        });
        return z.NEVER;
      }
    }),
]);

export const lineReaderOptionsSchema = z.object({
  separator: separatorSchema.default("\n"),
  fieldPattern: fieldPatternSchema.default(DEFAULT_FIELD_PATTERN),
  maxRecordSize: z.number().int().positive().default(DEFAULT_MAX_RECORD_SIZE),
  overflow: z.enum(["error", "truncate"]).default("error"),
});

export type LineReaderOptions = z.input<typeof lineReaderOptionsSchema>;
export type ResolvedLineReaderOptions = z.output<typeof lineReaderOptionsSchema>;

export const configSchema = z.object({
  reader: lineReaderOptionsSchema.default({}),

  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      format: z.enum(["compact", "hybrid", "minimal", "pretty"]).default("compact"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/** Render zod issues as `path: message; ...`. */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`).join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readConfigFile(configPath: string, explicit: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    // Only the implicit default location may be absent
    if (!explicit && isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(`Failed to read configuration file ${configPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables
 * 2. Config file at `path`, else LINEWISE_CONFIG, else ./linewise.json
 * 3. Schema defaults
 *
 * A missing ./linewise.json is ignored; a missing file that was named
 * explicitly is an error.
 */
export async function loadConfig(path?: string): Promise<Config> {
  const explicitPath = path || process.env.LINEWISE_CONFIG;
  const fileConfig = await readConfigFile(explicitPath || "./linewise.json", Boolean(explicitPath));

  const envConfig: Record<string, unknown> = {};

  // Reader overrides
  if (
    process.env.LINE_SEPARATOR ||
    process.env.FIELD_PATTERN ||
    process.env.MAX_RECORD_SIZE ||
    process.env.RECORD_OVERFLOW
  ) {
    envConfig.reader = {
      ...(isRecord(fileConfig.reader) ? fileConfig.reader : {}),
      ...(process.env.LINE_SEPARATOR ? { separator: process.env.LINE_SEPARATOR } : {}),
      ...(process.env.FIELD_PATTERN ? { fieldPattern: process.env.FIELD_PATTERN } : {}),
      ...(process.env.MAX_RECORD_SIZE ? { maxRecordSize: Number.parseInt(process.env.MAX_RECORD_SIZE, 10) } : {}),
      ...(process.env.RECORD_OVERFLOW ? { overflow: process.env.RECORD_OVERFLOW } : {}),
    };
  }

  // Logging overrides
  if (process.env.LOG_LEVEL || process.env.LOG_FORMAT) {
    envConfig.logging = {
      ...(isRecord(fileConfig.logging) ? fileConfig.logging : {}),
      ...(process.env.LOG_LEVEL ? { level: process.env.LOG_LEVEL } : {}),
      ...(process.env.LOG_FORMAT ? { format: process.env.LOG_FORMAT } : {}),
    };
  }

  const result = configSchema.safeParse({ ...fileConfig, ...envConfig });
  if (!result.success) {
    throw new ConfigError(`Failed to load configuration: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}
