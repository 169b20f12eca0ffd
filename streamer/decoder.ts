/**
 * Decoder process adapter: turns an audio file into raw PCM via ffmpeg.
 *
 * Spawns one decoder process per playback and streams its stdout as raw
 * 16-bit signed little-endian PCM at the requested rate and channel count.
 * The whole file is never held in memory.
 *
 * Responsibilities:
 * - Probe the file duration with ffprobe (bounded, non-fatal)
 * - Spawn ffmpeg and yield its stdout chunks incrementally
 * - Report non-zero exits, spawn failures and read errors as StreamDecodeError,
 *   after every byte already read has been delivered
 * - Kill the decoder on cancellation or when it stalls
 * - Kill and reap the process on every exit path
 */

import { spawn, type ChildProcess } from "child_process";

import { DurationProbeError, PlaybackCancelledError, StreamDecodeError } from "./errors.js";

import type { OutputFormat, PlaybackRequest } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default max wait for ffprobe (ms) */
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/** Default max silence from the decoder before it is considered stalled (ms) */
export const DEFAULT_DECODE_STALL_TIMEOUT_MS = 10_000;

/** Grace period between SIGTERM and SIGKILL when stopping the decoder (ms) */
const KILL_GRACE_MS = 2_000;

/** How much decoder stderr to keep for error messages (bytes) */
const STDERR_TAIL_BYTES = 2_048;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Builders for the external commands. Each returns argv, program first.
 * Overridable so tests can substitute a mock decoder.
 */
export interface DecoderCommands {
  /** Command that prints the duration in seconds on stdout */
  probe: (filePath: string) => string[];
  /** Command that writes raw s16le PCM to stdout */
  decode: (filePath: string, format: OutputFormat) => string[];
}

/** Options for a single decode run */
export interface DecodeOptions {
  commands?: DecoderCommands;
  /** Aborting kills the decoder and ends the stream with PlaybackCancelledError */
  signal?: AbortSignal;
  /** Max time without stdout output before the decoder is killed (ms) */
  stallTimeoutMs?: number;
}

/** Options for a duration probe */
export interface ProbeOptions {
  commands?: DecoderCommands;
  timeoutMs?: number;
  /** Aborting kills the probe; the duration is then reported as unknown */
  signal?: AbortSignal;
}

/** How a child process ended */
interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned */
  error: Error | null;
}

/** The stock ffmpeg/ffprobe command lines */
export const FFMPEG_COMMANDS: DecoderCommands = {
  probe: (filePath) => [
    "ffprobe",
    "-v", "error",
    "-show_entries", "format=duration",
    "-of", "default=noprint_wrappers=1:nokey=1",
    filePath,
  ],
  decode: (filePath, format) => [
    "ffmpeg",
    "-nostdin",
    "-v", "error",
    "-i", filePath,
    "-f", "s16le",
    "-acodec", "pcm_s16le",
    "-ar", String(format.sampleRate),
    "-ac", String(format.channels),
    "-",
  ],
};

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Determine the duration of an audio file in seconds.
 *
 * Never throws: any failure (missing ffprobe, bad output, timeout) is logged
 * as a warning and reported as null so playback can proceed without it.
 *
 * @param filePath - Audio file to probe
 * @param options - Command overrides and timeout
 * @returns Duration in seconds, or null if unknown
 */
export async function probeDuration(filePath: string, options: ProbeOptions = {}): Promise<number | null> {
  const commands = options.commands ?? FFMPEG_COMMANDS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const signal = options.signal;

  try {
    const stdout = await runToCompletion(commands.probe(filePath), timeoutMs, signal);
    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration) || duration < 0) {
      throw new DurationProbeError(`unparsable duration output: ${JSON.stringify(stdout.trim())}`);
    }
    return duration;
  } catch (err) {
    // Cancellation is not a probe failure
    if (signal?.aborted) return null;
    const probeError =
      err instanceof DurationProbeError
        ? err
        : new DurationProbeError(`could not probe ${filePath}`, { cause: err });
    const cause = probeError.cause instanceof Error ? `: ${probeError.cause.message}` : "";
    console.warn(`[decoder] Could not get duration: ${probeError.message}${cause}`);
    return null;
  }
}

/**
 * Decode an audio file into raw PCM, yielding stdout chunks as they arrive.
 *
 * The decoder process is owned by this generator. Whether the stream runs to
 * the end, throws, is aborted, or the consumer stops iterating early, the
 * process is killed (if still running) and reaped before the generator settles.
 *
 * @param request - File and target format
 * @param options - Command overrides, abort signal, stall timeout
 * @returns Async stream of raw s16le PCM buffers
 * @throws StreamDecodeError on spawn failure, read error, stall or non-zero exit
 * @throws PlaybackCancelledError if the signal aborts the stream
 */
export async function* streamDecodedPcm(
  request: PlaybackRequest,
  options: DecodeOptions = {}
): AsyncGenerator<Buffer> {
  const { filePath, format } = request;
  const commands = options.commands ?? FFMPEG_COMMANDS;
  const stallTimeoutMs = options.stallTimeoutMs ?? DEFAULT_DECODE_STALL_TIMEOUT_MS;
  const signal = options.signal;

  if (signal?.aborted) {
    throw new PlaybackCancelledError(`Playback of ${filePath} cancelled before decoding`);
  }

  const argv = commands.decode(filePath, format);
  const proc = spawn(argv[0], argv.slice(1), { stdio: ["ignore", "pipe", "pipe"] });
  const exited = waitForExit(proc);
  const stderr = captureStderrTail(proc);

  let stalled = false;
  let stallTimer: ReturnType<typeof setTimeout> | null = null;

  /** Restart the stall watchdog; fires SIGKILL if no output arrives in time */
  const armStallTimer = () => {
    if (stallTimer) clearTimeout(stallTimer);
    stallTimer = setTimeout(() => {
      stalled = true;
      proc.kill("SIGKILL");
    }, stallTimeoutMs);
  };

  const onAbort = () => {
    proc.kill("SIGTERM");
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const stdout = proc.stdout;
    if (!stdout) {
      throw new StreamDecodeError(`Failed to get decoder stdout for ${filePath}`, filePath);
    }

    armStallTimer();

    let readError: unknown = null;
    try {
      for await (const chunk of stdout) {
        // The watchdog measures decoder silence, not time spent in the consumer
        if (stallTimer) clearTimeout(stallTimer);
        yield toBuffer(chunk);
        armStallTimer();
      }
    } catch (err) {
      readError = err;
    }

    if (stallTimer) clearTimeout(stallTimer);

    const outcome = await exited;

    if (signal?.aborted) {
      throw new PlaybackCancelledError(`Playback of ${filePath} cancelled`);
    }

    if (stalled) {
      throw new StreamDecodeError(
        `Decoder produced no output for ${stallTimeoutMs}ms while decoding ${filePath}`,
        filePath
      );
    }

    if (outcome.error) {
      throw new StreamDecodeError(`Decoder failed to start for ${filePath}`, filePath, {
        cause: outcome.error,
      });
    }

    if (readError !== null) {
      throw new StreamDecodeError(`Failed reading decoder output for ${filePath}`, filePath, {
        cause: readError,
      });
    }

    if (outcome.code !== 0) {
      const how = outcome.signal ? `signal ${outcome.signal}` : `code ${outcome.code}`;
      const detail = stderr().trim();
      throw new StreamDecodeError(
        `Decoder exited with ${how} for ${filePath}${detail ? `: ${detail}` : ""}`,
        filePath
      );
    }
  } finally {
    if (stallTimer) clearTimeout(stallTimer);
    signal?.removeEventListener("abort", onAbort);
    await stopProcess(proc, exited);
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Resolve once the child has exited or failed to spawn. Never rejects.
 * Registering the "error" listener here also keeps spawn failures from
 * surfacing as unhandled errors.
 *
 * @param proc - The child process
 * @returns How the process ended
 */
function waitForExit(proc: ChildProcess): Promise<ProcessOutcome> {
  return new Promise<ProcessOutcome>((resolve) => {
    proc.once("error", (error) => {
      resolve({ code: null, signal: null, error });
    });
    proc.once("close", (code, signal) => {
      resolve({ code, signal, error: null });
    });
  });
}

/**
 * Keep the last few KB of a child's stderr for diagnostics.
 * Draining stderr also prevents the child from blocking on a full pipe.
 *
 * @param proc - The child process
 * @returns Accessor for the captured tail
 */
function captureStderrTail(proc: ChildProcess): () => string {
  let tail = "";
  proc.stderr?.on("data", (data: Buffer) => {
    tail = (tail + data.toString()).slice(-STDERR_TAIL_BYTES);
  });
  return () => tail;
}

/**
 * Terminate the process if it is still running and wait for it to exit.
 * Escalates to SIGKILL if SIGTERM is ignored.
 *
 * @param proc - The child process
 * @param exited - Promise from waitForExit for the same process
 */
async function stopProcess(proc: ChildProcess, exited: Promise<ProcessOutcome>): Promise<void> {
  const running = proc.exitCode === null && proc.signalCode === null && proc.pid !== undefined;
  if (running) {
    proc.kill("SIGTERM");
  }

  const escalate = setTimeout(() => {
    proc.kill("SIGKILL");
  }, KILL_GRACE_MS);

  try {
    await exited;
  } finally {
    clearTimeout(escalate);
  }
}

/**
 * Run a short-lived command and collect its stdout.
 *
 * @param argv - Program and arguments
 * @param timeoutMs - Kill the process and reject after this long
 * @param signal - Aborting kills the process and rejects once it has exited
 * @returns The process stdout
 * @throws Error on spawn failure, timeout, abort or non-zero exit
 */
function runToCompletion(argv: string[], timeoutMs: number, signal?: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(`${argv[0]} cancelled before start`));
      return;
    }

    const proc = spawn(argv[0], argv.slice(1), { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let timedOut = false;
    let aborted = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, timeoutMs);

    const onAbort = () => {
      aborted = true;
      proc.kill("SIGKILL");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    proc.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    const stderr = captureStderrTail(proc);

    proc.once("error", (err) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      reject(new Error(`${argv[0]} failed to start: ${err.message}`));
    });

    proc.once("close", (code) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      if (aborted) {
        reject(new Error(`${argv[0]} cancelled`));
      } else if (timedOut) {
        reject(new Error(`${argv[0]} did not finish within ${timeoutMs}ms`));
      } else if (code !== 0) {
        const detail = stderr().trim();
        reject(new Error(`${argv[0]} exited with code ${code}${detail ? `: ${detail}` : ""}`));
      } else {
        resolve(stdout);
      }
    });
  });
}

/**
 * Normalize a stdout chunk to a Buffer.
 *
 * @param chunk - Chunk from a binary Readable (Buffer unless an encoding was set)
 * @returns The chunk as a Buffer
 */
function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}
