/**
 * Log sanitization: truncates large values before they reach the log.
 *
 * Records can be arbitrarily long, so log fields are cut down:
 * - long strings are truncated with a character count
 * - byte arrays are replaced by their length
 * - long arrays show their length and the first N items
 * - deep objects show only their keys past a depth limit
 *
 * LOG_SANITIZE=false turns this off.
 */

export interface SanitizeOptions {
  /** Maximum number of array items to show */
  maxArrayLength: number;
  /** Maximum string length before truncation */
  maxStringLength: number;
  /** Maximum object depth before showing keys only */
  maxDepth: number;
  /** Current depth (internal, for recursion tracking) */
  currentDepth: number;
  /** Keys that are never truncated */
  preserveKeys: string[];
}

export const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = {
  maxArrayLength: 3,
  maxStringLength: 500,
  maxDepth: 3,
  currentDepth: 0,
  preserveKeys: ["event", "component", "code"],
};

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;

  return `${str.slice(0, maxLength)}... [truncated: ${str.length} chars total]`;
}

export function truncateArray(arr: unknown[], options: SanitizeOptions): unknown {
  const nested = { ...options, currentDepth: options.currentDepth + 1 };

  if (arr.length <= options.maxArrayLength) {
    return arr.map((item) => sanitizeForLogging(item, nested));
  }

  return {
    __arrayInfo__: {
      length: arr.length,
      showing: options.maxArrayLength,
      items: arr.slice(0, options.maxArrayLength).map((item) => sanitizeForLogging(item, nested)),
    },
  };
}

export function truncateObject(obj: Record<string, unknown>, options: SanitizeOptions): Record<string, unknown> {
  if (options.currentDepth >= options.maxDepth) {
    return {
      __keys__: Object.keys(obj),
      __depth__: "max depth exceeded",
    };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = options.preserveKeys.includes(key)
      ? value
      : sanitizeForLogging(value, { ...options, currentDepth: options.currentDepth + 1 });
  }
  return result;
}

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(value: unknown, options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "boolean" || typeof value === "number") return value;

  if (typeof value === "string") {
    return truncateString(value, options.maxStringLength);
  }

  if (value instanceof Uint8Array) {
    return `[bytes: ${value.length}]`;
  }

  if (Array.isArray(value)) {
    return truncateArray(value, options);
  }

  if (value instanceof RegExp) {
    return String(value);
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: truncateString(value.message, options.maxStringLength),
      stack: value.stack ? truncateString(value.stack, options.maxStringLength) : undefined,
    };
  }

  if (typeof value === "object") {
    return truncateObject(Object.fromEntries(Object.entries(value)), options);
  }

  return String(value);
}

/** Sanitize a top-level pino log object. */
export function sanitizeLogObject(
  obj: Record<string, unknown>,
  options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS,
): Record<string, unknown> {
  return truncateObject(obj, options);
}

function parseLimit(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getSanitizeOptionsFromEnv(): SanitizeOptions {
  return {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: parseLimit(process.env.LOG_MAX_ARRAY_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxArrayLength),
    maxStringLength: parseLimit(process.env.LOG_MAX_STRING_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxStringLength),
    maxDepth: parseLimit(process.env.LOG_MAX_DEPTH, DEFAULT_SANITIZE_OPTIONS.maxDepth),
  };
}
