/**
 * Playback session: one persistent room connection, many file playbacks.
 *
 * Connects to the room and publishes a single audio track once, then plays
 * files through that track on demand without reconnecting. Each play() runs
 * one decoder process and one frame chunker to completion.
 *
 * Responsibilities:
 * - Connect and publish exactly once (concurrent connects share one attempt)
 * - Run decode -> chunk -> captureFrame for one file per play()
 * - Reject overlapping play() calls instead of interleaving audio
 * - Keep the session connected after any play() failure
 * - Abort the in-flight playback and tear everything down on disconnect()
 */

import { access, constants } from "fs/promises";

import { probeDuration, streamDecodedPcm } from "./decoder.js";
import {
  ConnectionError,
  PlaybackCancelledError,
  PlaybackInProgressError,
  SessionStateError,
  SinkRejectionError,
  StreamDecodeError,
  describeError,
} from "./errors.js";
import { chunkFrames } from "./frame-chunker.js";

import type { DecoderCommands } from "./decoder.js";
import type { PublishedAudioTrack, RoomTransport, TokenIssuer } from "./transport.js";
import type { ConnectionState, PlaybackRequest, PlaybackResult, StreamerConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Log a progress line every N frames (50 x 20ms = 1s of audio) */
const PROGRESS_LOG_INTERVAL_FRAMES = 50;

// ============================================================================
// INTERFACES
// ============================================================================

/** Collaborators injected into the session */
export interface PlaybackSessionDeps {
  transport: RoomTransport;
  issueToken: TokenIssuer;
  /** Decoder command overrides (defaults to ffmpeg/ffprobe) */
  decoderCommands?: DecoderCommands;
}

/**
 * A long-lived connection plus published track, reused across playbacks.
 */
export interface PlaybackSession {
  /**
   * Join the room and publish the audio track. No-op if already connected.
   * @param roomName - Room to join
   * @throws ConnectionError if connecting or publishing fails
   */
  connect(roomName: string): Promise<void>;

  /**
   * Decode a file and push every frame into the published track, in order.
   * Resolves after the last frame has been accepted.
   * @param filePath - Audio file to play
   * @returns Summary of the playback
   * @throws SessionStateError if not connected
   * @throws PlaybackInProgressError if another play() is running
   * @throws StreamDecodeError, SinkRejectionError, PlaybackCancelledError on failure
   */
  play(filePath: string): Promise<PlaybackResult>;

  /**
   * Stop any in-flight playback, unpublish the track and leave the room.
   * Safe to call repeatedly.
   */
  disconnect(): Promise<void>;

  /** @returns Current connection state */
  getState(): ConnectionState;

  /** @returns true while a play() call is running */
  isPlaying(): boolean;
}

/** The playback currently running, if any */
interface ActivePlayback {
  controller: AbortController;
  /** Settles (never rejects) when the play() call has fully unwound */
  settled: Promise<void>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a playback session. Nothing connects until connect() is called.
 *
 * @param config - Streamer configuration (URL, format, frame duration, timeouts)
 * @param deps - Transport, token issuer and optional decoder overrides
 * @returns A disconnected PlaybackSession
 */
export function createPlaybackSession(config: StreamerConfig, deps: PlaybackSessionDeps): PlaybackSession {
  const { transport, issueToken, decoderCommands } = deps;

  let state: ConnectionState = "disconnected";
  let roomName: string | null = null;
  let track: PublishedAudioTrack | null = null;
  let connecting: Promise<void> | null = null;
  let active: ActivePlayback | null = null;
  let closed = false;
  let disconnecting: Promise<void> | null = null;

  /**
   * Join the room and publish the track, sharing any in-flight attempt.
   * @param name - Room to join
   */
  function connect(name: string): Promise<void> {
    if (closed) {
      return Promise.reject(new ConnectionError("Session has been disconnected and cannot reconnect"));
    }
    if (state === "connected") {
      console.log("[session] Already connected");
      return Promise.resolve();
    }
    if (connecting) return connecting;

    connecting = establish(name).finally(() => {
      connecting = null;
    });
    return connecting;
  }

  /**
   * Perform the actual connect + publish. On failure, undo a half-open connection.
   * @param name - Room to join
   */
  async function establish(name: string): Promise<void> {
    state = "connecting";
    roomName = name;
    let joined = false;

    try {
      const token = await issueToken(name);

      console.log(`[session] Connecting to room: ${name}`);
      await transport.connect(config.livekitUrl, token);
      joined = true;
      console.log("[session] Connected to room");

      track = await transport.publishAudioTrack(config.trackName, config.format);
      state = "connected";
      console.log(`[session] Published audio track: ${track.sid}`);
    } catch (err) {
      state = "disconnected";
      roomName = null;
      track = null;
      if (joined) {
        await transport.disconnect().catch((disconnectErr: unknown) => {
          console.error(`[session] Failed to leave room after publish error: ${describeError(disconnectErr)}`);
        });
      }
      throw new ConnectionError(`Failed to connect to room "${name}"`, { cause: err });
    }
  }

  /**
   * Play one file through the published track.
   * @param filePath - Audio file to play
   */
  async function play(filePath: string): Promise<PlaybackResult> {
    const publishedTrack = track;
    if (closed || state !== "connected" || !publishedTrack) {
      throw new SessionStateError("Not connected. Call connect() first.");
    }
    if (active) {
      throw new PlaybackInProgressError(`Cannot play ${filePath}: another playback is still running`);
    }

    const controller = new AbortController();
    let markSettled: () => void = () => {};
    const settled = new Promise<void>((resolve) => {
      markSettled = resolve;
    });
    active = { controller, settled };

    try {
      return await runPlayback({ filePath, format: config.format }, publishedTrack, controller.signal);
    } finally {
      active = null;
      markSettled();
    }
  }

  /**
   * Drive one decode -> chunk -> sink pipeline to completion.
   * @param request - File and target format
   * @param sink - The published track
   * @param signal - Aborted by disconnect()
   */
  async function runPlayback(
    request: PlaybackRequest,
    sink: PublishedAudioTrack,
    signal: AbortSignal
  ): Promise<PlaybackResult> {
    const { filePath } = request;
    const startedAt = Date.now();

    await assertReadable(filePath);

    console.log(`[session] Playing: ${filePath}`);
    const durationSeconds = await probeDuration(filePath, {
      commands: decoderCommands,
      timeoutMs: config.probeTimeoutMs,
      signal,
    });
    if (signal.aborted) {
      throw new PlaybackCancelledError(`Playback of ${filePath} cancelled`);
    }
    if (durationSeconds !== null) {
      console.log(`[session] Audio duration: ${durationSeconds.toFixed(2)}s`);
    }

    const pcm = streamDecodedPcm(request, {
      commands: decoderCommands,
      signal,
      stallTimeoutMs: config.decodeStallTimeoutMs,
    });

    let frames = 0;
    // Breaking out of (or throwing inside) this loop closes the generators,
    // which kills and reaps the decoder before the error propagates
    for await (const frame of chunkFrames(pcm, request.format, config.frameDurationMs)) {
      if (signal.aborted) {
        throw new PlaybackCancelledError(`Playback of ${filePath} cancelled`);
      }

      try {
        await sink.captureFrame(frame);
      } catch (err) {
        throw new SinkRejectionError(`Sink rejected frame ${frames} of ${filePath}`, frames, { cause: err });
      }
      frames++;

      if (frames % PROGRESS_LOG_INTERVAL_FRAMES === 0) {
        const seconds = (frames * config.frameDurationMs) / 1000;
        console.log(`[session] Played ${frames} frames (${seconds.toFixed(1)}s)`);
      }
    }

    const elapsedMs = Date.now() - startedAt;
    console.log(`[session] Finished playing ${filePath} (${frames} frames in ${elapsedMs}ms)`);

    return { filePath, frames, durationSeconds, elapsedMs };
  }

  /**
   * Abort any playback, unpublish the track and leave the room. Runs at most once.
   */
  function disconnect(): Promise<void> {
    if (disconnecting) return disconnecting;
    if (state === "disconnected" && !connecting) {
      closed = true;
      return Promise.resolve();
    }

    disconnecting = teardown();
    return disconnecting;
  }

  /**
   * Tear down in order: playback, pending connect, track, room.
   */
  async function teardown(): Promise<void> {
    closed = true;

    if (active) {
      active.controller.abort();
      await active.settled;
    }

    // A connect still in flight either finishes (and is torn down below) or fails on its own
    if (connecting) {
      await connecting.catch(() => undefined);
    }

    if (state !== "connected") return;

    const publishedTrack = track;
    track = null;
    try {
      if (publishedTrack) {
        await publishedTrack.unpublish();
      }
    } catch (err) {
      console.error(`[session] Failed to unpublish track: ${describeError(err)}`);
    }

    try {
      await transport.disconnect();
    } finally {
      state = "disconnected";
      console.log(`[session] Disconnected from room${roomName ? `: ${roomName}` : ""}`);
      roomName = null;
    }
  }

  return {
    connect,
    play,
    disconnect,
    getState: () => state,
    isPlaying: () => active !== null,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Check that a file exists and is readable before spawning a decoder for it.
 *
 * @param filePath - File to check
 * @throws StreamDecodeError if the file cannot be read
 */
async function assertReadable(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch (err) {
    throw new StreamDecodeError(`Input file not readable: ${filePath}`, filePath, { cause: err });
  }
}
