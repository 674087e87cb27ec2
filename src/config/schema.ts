import { readFile } from "node:fs/promises";
import { z } from "zod";
import { InvalidSettingsError } from "../core/stream/errors";
import { materializerSettingsSchema } from "../core/stream/settings";

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  format: z.enum(["compact", "hybrid", "minimal", "pretty"]).default("compact"),
  sanitize: z.boolean().default(true),
  maxArrayLength: z.number().int().positive().default(3),
  maxStringLength: z.number().int().positive().default(500),
  maxDepth: z.number().int().positive().default(3),
});

export const configSchema = z.object({
  materializer: materializerSettingsSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(fileConfig: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = fileConfig[key];
  return isRecord(value) ? value : {};
}

function readInt(value: string | undefined): number | undefined {
  return value ? Number.parseInt(value, 10) : undefined;
}

/** Drop keys whose value is undefined so they don't shadow file values. */
function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      return {};
    }
    throw new InvalidSettingsError(`Failed to read configuration file ${configPath}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidSettingsError(`Configuration file ${configPath} is not valid JSON`, error);
  }
  if (!isRecord(parsed)) {
    throw new InvalidSettingsError(`Configuration file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables (highest priority - always override)
 * 2. Config file specified by path parameter
 * 3. Config file at CONFIG_FILE env var
 * 4. ./config.json
 * 5. Schema defaults (lowest priority)
 *
 * A missing file is not an error; an unreadable or malformed one is.
 */
export async function loadConfig(path?: string): Promise<Config> {
  const configPath = path || process.env.CONFIG_FILE || "./config.json";
  const fileConfig = await readConfigFile(configPath);
  const env = process.env;

  const materializerOverrides = defined({
    initialInputBufferSize: readInt(env.STREAM_INITIAL_INPUT_BUFFER_SIZE),
    maximumInputBufferSize: readInt(env.STREAM_MAXIMUM_INPUT_BUFFER_SIZE),
    initialFanOutBufferSize: readInt(env.STREAM_INITIAL_FANOUT_BUFFER_SIZE),
    maximumFanOutBufferSize: readInt(env.STREAM_MAXIMUM_FANOUT_BUFFER_SIZE),
    throughput: readInt(env.STREAM_THROUGHPUT),
    scheduler: env.STREAM_SCHEDULER || undefined,
  });

  const loggingOverrides = defined({
    level: env.LOG_LEVEL || undefined,
    format: env.LOG_FORMAT || undefined,
    sanitize: env.LOG_SANITIZE ? env.LOG_SANITIZE !== "false" : undefined,
    maxArrayLength: readInt(env.LOG_MAX_ARRAY_LENGTH),
    maxStringLength: readInt(env.LOG_MAX_STRING_LENGTH),
    maxDepth: readInt(env.LOG_MAX_DEPTH),
  });

  // Env values are merged per section, so a file may set fields env leaves alone
  const mergedConfig = {
    ...fileConfig,
    materializer: { ...section(fileConfig, "materializer"), ...materializerOverrides },
    logging: { ...section(fileConfig, "logging"), ...loggingOverrides },
  };

  const parsed = configSchema.safeParse(mergedConfig);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new InvalidSettingsError(`Failed to load configuration: ${details}`, parsed.error);
  }
  return parsed.data;
}
