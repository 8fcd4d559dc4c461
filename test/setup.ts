/**
 * Shared test setup for all workspaces.
 * - Isolates HOME so nothing touches a real data directory
 * - Silences the pino logger
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, afterEach } from "vitest";

const testHome = mkdtempSync(join(tmpdir(), "hodlchat-test-"));
const originalHome = process.env.HOME;

process.env.LOG_LEVEL = "silent";

beforeEach(() => {
  process.env.HOME = testHome;
});

afterEach(() => {
  process.env.HOME = originalHome;
});
