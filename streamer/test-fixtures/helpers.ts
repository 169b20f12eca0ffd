/**
 * Shared helpers for streamer tests: mock decoder commands, PCM patterns,
 * temp files and process checks.
 */

import { access, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

import type { TestContext } from "node:test";

import type { DecoderCommands } from "../decoder.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Node script that impersonates ffmpeg/ffprobe */
export const MOCK_DECODER = join(__dirname, "mock-decoder.mjs");

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Decoder commands that run the mock script instead of ffmpeg/ffprobe.
 *
 * @param decodeArgs - Flags for the decode run (see mock-decoder.mjs)
 * @param probeArgs - Flags for the probe run (defaults to printing "1.5")
 * @returns Commands usable wherever DecoderCommands is accepted
 */
export function mockCommands(decodeArgs: string[], probeArgs: string[] = ["--print", "1.5"]): DecoderCommands {
  return {
    probe: () => [process.execPath, MOCK_DECODER, ...probeArgs],
    decode: () => [process.execPath, MOCK_DECODER, ...decodeArgs],
  };
}

/**
 * The sample value the mock decoder writes at a given sample index.
 *
 * @param index - Sample index from the start of the stream
 * @returns (index % 1000) + 1
 */
export function patternSample(index: number): number {
  return (index % 1000) + 1;
}

/**
 * Build `sampleCount` samples of the mock decoder pattern as s16le bytes.
 *
 * @param sampleCount - Number of 16-bit samples
 * @returns Raw PCM bytes
 */
export function patternBytes(sampleCount: number): Buffer {
  const buf = Buffer.alloc(sampleCount * 2);
  for (let k = 0; k < sampleCount; k++) buf.writeInt16LE(patternSample(k), k * 2);
  return buf;
}

/**
 * Create a temp directory holding a placeholder "audio" file.
 * The mock decoder never reads it; play() only checks that it exists.
 * The directory is removed when the test finishes.
 *
 * @param t - The running test
 * @returns Paths of the directory, the placeholder file and a pid file slot
 */
export async function createWorkspace(t: TestContext): Promise<{ dir: string; audioFile: string; pidFile: string }> {
  const dir = await mkdtemp(join(tmpdir(), "room-audio-streamer-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const audioFile = join(dir, "clip.mp3");
  await writeFile(audioFile, "placeholder");
  return { dir, audioFile, pidFile: join(dir, "decoder.pid") };
}

/**
 * Read the pid the mock decoder wrote on startup.
 *
 * @param pidFile - Path passed to --pid-file
 * @returns The decoder's pid
 */
export async function readPid(pidFile: string): Promise<number> {
  return parseInt((await readFile(pidFile, "utf-8")).trim(), 10);
}

/**
 * Poll until a file exists, e.g. the pid file of a freshly spawned mock.
 *
 * @param path - File to wait for
 * @param timeoutMs - Give up after this long
 */
export async function waitForFile(path: string, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    try {
      await access(path);
      return;
    } catch (err) {
      if (Date.now() > deadline) throw err;
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
  }
}

/**
 * Check if a process with the given PID is still alive.
 * Uses signal 0 which does not kill the process -- it only checks existence.
 *
 * @param pid - The process ID to check
 * @returns true if the process is alive, false otherwise
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Drain an async iterable into an array.
 *
 * @param source - Items to collect
 * @returns Every item, in order
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}
