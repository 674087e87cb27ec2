import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { InvalidSettingsError } from "../core/stream/errors";
import { FlowMaterializer } from "../core/stream/materializer";
import { loadConfig } from "./schema";

let tempDir: string;
let configPath: string;

// Store original env vars to restore after tests
const originalEnv: Record<string, string | undefined> = {};

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "config-test-"));
  configPath = join(tempDir, "test-config.json");

  // Save and clear env vars that might interfere with tests
  const envVarsToSave = [
    "CONFIG_FILE",
    "STREAM_INITIAL_INPUT_BUFFER_SIZE",
    "STREAM_MAXIMUM_INPUT_BUFFER_SIZE",
    "STREAM_INITIAL_FANOUT_BUFFER_SIZE",
    "STREAM_MAXIMUM_FANOUT_BUFFER_SIZE",
    "STREAM_THROUGHPUT",
    "STREAM_SCHEDULER",
    "LOG_LEVEL",
    "LOG_FORMAT",
    "LOG_SANITIZE",
    "LOG_MAX_ARRAY_LENGTH",
    "LOG_MAX_STRING_LENGTH",
    "LOG_MAX_DEPTH",
  ];

  for (const key of envVarsToSave) {
    originalEnv[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });

  // Restore original env vars
  for (const [key, value] of Object.entries(originalEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

test("uses schema defaults when no config file exists", async () => {
  const config = await loadConfig(join(tempDir, "missing.json"));

  expect(config.materializer).toEqual({
    initialInputBufferSize: 4,
    maximumInputBufferSize: 16,
    initialFanOutBufferSize: 4,
    maximumFanOutBufferSize: 16,
    throughput: 32,
    scheduler: "immediate",
  });
  expect(config.logging.level).toBe("info");
  expect(config.logging.format).toBe("compact");
});

test("loads config from file", async () => {
  await writeFile(
    configPath,
    JSON.stringify({
      materializer: { initialInputBufferSize: 8, maximumInputBufferSize: 64, scheduler: "microtask" },
      logging: { level: "debug" },
    }),
  );

  const config = await loadConfig(configPath);

  expect(config.materializer.initialInputBufferSize).toBe(8);
  expect(config.materializer.maximumInputBufferSize).toBe(64);
  expect(config.materializer.scheduler).toBe("microtask");
  // Unset fields keep their defaults
  expect(config.materializer.throughput).toBe(32);
  expect(config.logging.level).toBe("debug");
});

test("reads the path from CONFIG_FILE when no argument is given", async () => {
  await writeFile(configPath, JSON.stringify({ materializer: { throughput: 5 } }));
  process.env.CONFIG_FILE = configPath;

  const config = await loadConfig();

  expect(config.materializer.throughput).toBe(5);
});

test("environment variables override only specific fields", async () => {
  await writeFile(
    configPath,
    JSON.stringify({
      materializer: { initialInputBufferSize: 2, throughput: 10 },
      logging: { level: "warn", maxDepth: 5 },
    }),
  );

  process.env.STREAM_THROUGHPUT = "64";
  process.env.LOG_LEVEL = "error";

  const config = await loadConfig(configPath);

  expect(config.materializer.throughput).toBe(64);
  expect(config.materializer.initialInputBufferSize).toBe(2);
  expect(config.logging.level).toBe("error");
  expect(config.logging.maxDepth).toBe(5);
});

test("works with no config file, only env vars", async () => {
  process.env.STREAM_INITIAL_FANOUT_BUFFER_SIZE = "2";
  process.env.STREAM_MAXIMUM_FANOUT_BUFFER_SIZE = "8";
  process.env.STREAM_SCHEDULER = "microtask";
  process.env.LOG_SANITIZE = "false";

  const config = await loadConfig("/nonexistent/path.json");

  expect(config.materializer.initialFanOutBufferSize).toBe(2);
  expect(config.materializer.maximumFanOutBufferSize).toBe(8);
  expect(config.materializer.scheduler).toBe("microtask");
  expect(config.logging.sanitize).toBe(false);
});

test("rejects an initial buffer size above its maximum", async () => {
  await writeFile(configPath, JSON.stringify({ materializer: { initialInputBufferSize: 32 } }));

  await expect(loadConfig(configPath)).rejects.toThrow(
    "Failed to load configuration: materializer.initialInputBufferSize: initialInputBufferSize must not exceed maximumInputBufferSize",
  );
});

test("rejects a malformed config file", async () => {
  await writeFile(configPath, "{ not json");

  await expect(loadConfig(configPath)).rejects.toBeInstanceOf(InvalidSettingsError);
});

test("rejects an unknown scheduler from the environment", async () => {
  process.env.STREAM_SCHEDULER = "threads";

  await expect(loadConfig(configPath)).rejects.toThrow(/materializer\.scheduler/);
});

test("materializer settings feed a FlowMaterializer", async () => {
  await writeFile(configPath, JSON.stringify({ materializer: { throughput: 7 } }));

  const config = await loadConfig(configPath);
  const materializer = new FlowMaterializer(config.materializer);

  expect(materializer.settings.throughput).toBe(7);
});
