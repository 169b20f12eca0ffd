/**
 * Tests for env file reading and merging.
 *
 * Run: npx tsx --test services/env.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { ConfigurationError } from "../streamer/errors.js";
import { mergeEnv, readEnv } from "./env.js";

test("readEnv parses KEY=VALUE lines, skipping comments and stripping quotes", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "env-test-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const envPath = join(dir, ".env.local");
  await writeFile(
    envPath,
    [
      "# LiveKit",
      "LIVEKIT_URL=wss://livekit.test",
      'LIVEKIT_API_KEY="test-key"',
      "",
      "LIVEKIT_API_SECRET='test-secret'",
    ].join("\n")
  );

  assert.deepEqual(await readEnv(envPath), {
    LIVEKIT_URL: "wss://livekit.test",
    LIVEKIT_API_KEY: "test-key",
    LIVEKIT_API_SECRET: "test-secret",
  });
});

test("readEnv returns an empty record when the default .env.local does not exist", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "env-test-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const cwd = process.cwd();
  process.chdir(dir);
  t.after(() => process.chdir(cwd));

  assert.deepEqual(await readEnv(), {});
});

test("readEnv rejects an explicitly requested file that does not exist", async (t) => {
  const dir = await mkdtemp(join(tmpdir(), "env-test-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const missing = join(dir, "missing.env");

  await assert.rejects(() => readEnv(missing), (err) => {
    assert.ok(err instanceof ConfigurationError);
    assert.equal(err.message, `Cannot read env file ${missing}`);
    return true;
  });
});

test("mergeEnv lets process variables override file values", () => {
  const merged = mergeEnv(
    { LIVEKIT_URL: "wss://from-file.test", LIVEKIT_API_KEY: "file-key" },
    { LIVEKIT_URL: "wss://from-process.test", UNSET: undefined }
  );

  assert.deepEqual(merged, { LIVEKIT_URL: "wss://from-process.test", LIVEKIT_API_KEY: "file-key" });
});
