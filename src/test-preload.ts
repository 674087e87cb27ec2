/**
 * Vitest setup file, loaded before each test file.
 * Keeps stage and materializer logging out of test output.
 *
 * Environment variables:
 * - TEST_VERBOSE: "1" keeps log and console output
 */

const verbose = process.env.TEST_VERBOSE === "1";

// The formatter stream re-reads LOG_LEVEL for every record
if (!verbose) {
  process.env.LOG_LEVEL = "silent";
}

// The base logger may already exist; silence it directly
import { logger } from "./core/logging/logger";

if (!verbose) {
  logger.level = "silent";

  const noop = () => {};
  console.log = noop;
  console.debug = noop;
  console.info = noop;
  console.warn = noop;
  // console.error stays visible for failing tests
}
