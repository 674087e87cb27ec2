/**
 * Truncates log payloads so that stream elements and buffers stay readable.
 *
 * - long arrays: length plus the first N items
 * - deep objects: keys only beyond a depth threshold
 * - long strings: cut with the original length appended
 *
 * LOG_SANITIZE=false disables it entirely.
 */

export interface SanitizeOptions {
  maxArrayLength: number;
  maxStringLength: number;
  maxDepth: number;
  /** Current depth (internal, for recursion tracking) */
  currentDepth: number;
  /** Keys that are never truncated */
  preserveKeys: string[];
  /** Keys that are always reduced to a summary */
  truncateKeys: string[];
}

export const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = {
  maxArrayLength: 3,
  maxStringLength: 500,
  maxDepth: 3,
  currentDepth: 0,
  preserveKeys: ["event", "component", "materializationId", "stage", "state", "code"],
  truncateKeys: ["element", "elements", "buffer"],
};

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return `${str.slice(0, maxLength)}... [truncated: ${str.length} chars total]`;
}

function deeper(options: SanitizeOptions): SanitizeOptions {
  return { ...options, currentDepth: options.currentDepth + 1 };
}

export function truncateArray(arr: unknown[], options: SanitizeOptions): unknown {
  const items = arr.slice(0, options.maxArrayLength).map((item) => sanitizeForLogging(item, deeper(options)));
  if (arr.length <= options.maxArrayLength) return items;

  return {
    __arrayInfo__: {
      length: arr.length,
      showing: options.maxArrayLength,
      items,
    },
  };
}

export function truncateObject(obj: Record<string, unknown>, options: SanitizeOptions): Record<string, unknown> {
  if (options.currentDepth >= options.maxDepth) {
    return { __keys__: Object.keys(obj), __depth__: "max depth exceeded" };
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (options.preserveKeys.includes(key)) {
      result[key] = value;
    } else if (options.truncateKeys.includes(key)) {
      result[key] = summarize(value, options);
    } else {
      result[key] = sanitizeForLogging(value, deeper(options));
    }
  }
  return result;
}

function summarize(value: unknown, options: SanitizeOptions): unknown {
  if (Array.isArray(value)) {
    return truncateArray(value, { ...options, maxArrayLength: 1 });
  }
  if (isPlainObject(value)) {
    return { __keys__: Object.keys(value) };
  }
  return sanitizeForLogging(value, deeper(options));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeForLogging(value: unknown, options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "boolean" || typeof value === "number") return value;
  if (typeof value === "string") return truncateString(value, options.maxStringLength);
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return truncateArray(value, options);

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack ? truncateString(value.stack, options.maxStringLength) : undefined,
    };
  }
  if (isPlainObject(value)) return truncateObject(value, options);

  return String(value);
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export function getSanitizeOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): SanitizeOptions {
  return {
    ...DEFAULT_SANITIZE_OPTIONS,
    maxArrayLength: readPositiveInt(env.LOG_MAX_ARRAY_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxArrayLength),
    maxStringLength: readPositiveInt(env.LOG_MAX_STRING_LENGTH, DEFAULT_SANITIZE_OPTIONS.maxStringLength),
    maxDepth: readPositiveInt(env.LOG_MAX_DEPTH, DEFAULT_SANITIZE_OPTIONS.maxDepth),
  };
}
