/**
 * Tests for command-line argument parsing.
 *
 * Run: npx tsx --test streamer/cli-args.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_INPUT_FILE, parseArgs } from "./cli-args.js";
import { ConfigurationError } from "./errors.js";

test("no arguments: default input file, prompt for the room, default env file", () => {
  assert.deepEqual(parseArgs([]), { inputFile: DEFAULT_INPUT_FILE, room: null, envFile: null });
});

test("positional input file with --room and --env-file in any order", () => {
  assert.deepEqual(parseArgs(["--room", "lobby", "voice.wav", "--env-file", "prod.env"]), {
    inputFile: "voice.wav",
    room: "lobby",
    envFile: "prod.env",
  });
});

test("a flag without a value is rejected", () => {
  assert.throws(() => parseArgs(["--room"]), /--room requires a value/);
  assert.throws(() => parseArgs(["--room", "--env-file", "x"]), /--room requires a value/);
});

test("unknown flags and extra positionals are rejected", () => {
  assert.throws(() => parseArgs(["--loop"]), ConfigurationError);
  assert.throws(() => parseArgs(["a.mp3", "b.mp3"]), /Unexpected argument: b.mp3/);
});
