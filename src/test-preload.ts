/**
 * Test setup - runs before each test file.
 * Silences logging unless TEST_VERBOSE=1.
 *
 * LOG_LEVEL is read when the logger module loads, so it has to be set
 * before any test imports it.
 */

if (process.env.TEST_VERBOSE !== "1") {
  process.env.LOG_LEVEL = "silent";
}
