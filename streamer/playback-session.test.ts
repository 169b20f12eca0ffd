/**
 * Tests for the playback session.
 *
 * Uses an in-memory fake transport that records every frame pushed into the
 * published track, and the mock decoder script in place of ffmpeg.
 *
 * Run: npx tsx --test streamer/playback-session.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { DEFAULT_STREAMER_SETTINGS } from "./config.js";
import {
  ConnectionError,
  PlaybackCancelledError,
  PlaybackInProgressError,
  SessionStateError,
  SinkRejectionError,
  StreamDecodeError,
} from "./errors.js";
import { createPlaybackSession } from "./playback-session.js";
import {
  createWorkspace,
  isProcessAlive,
  mockCommands,
  patternSample,
  readPid,
  waitForFile,
} from "./test-fixtures/helpers.js";

import type { DecoderCommands } from "./decoder.js";
import type { PlaybackSession } from "./playback-session.js";
import type { PublishedAudioTrack, RoomTransport } from "./transport.js";
import type { AudioFrame, StreamerConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const CONFIG: StreamerConfig = {
  ...DEFAULT_STREAMER_SETTINGS,
  livekitUrl: "wss://livekit.test",
  apiKey: "test-key",
  apiSecret: "test-secret",
};

// ============================================================================
// HELPERS
// ============================================================================

/** Options controlling how the fake transport misbehaves */
interface FakeTransportOptions {
  failConnect?: boolean;
  failPublish?: boolean;
  /** Reject the frame with this index */
  rejectFrameAt?: number;
}

/** Call counters and captured frames from the fake transport */
interface FakeTransport {
  transport: RoomTransport;
  calls: { connect: number; publish: number; unpublish: number; disconnect: number };
  connectArgs: Array<{ url: string; token: string }>;
  frames: AudioFrame[];
  /** Resolves when the first frame has been captured */
  firstFrame: Promise<void>;
}

/** Build an in-memory RoomTransport that records everything. */
function createFakeTransport(options: FakeTransportOptions = {}): FakeTransport {
  const calls = { connect: 0, publish: 0, unpublish: 0, disconnect: 0 };
  const connectArgs: Array<{ url: string; token: string }> = [];
  const frames: AudioFrame[] = [];
  let signalFirstFrame: () => void = () => {};
  const firstFrame = new Promise<void>((resolve) => {
    signalFirstFrame = resolve;
  });

  const track: PublishedAudioTrack = {
    sid: "TR_test",
    captureFrame: async (frame) => {
      if (options.rejectFrameAt !== undefined && frames.length === options.rejectFrameAt) {
        throw new Error("audio source closed");
      }
      frames.push(frame);
      signalFirstFrame();
    },
    unpublish: async () => {
      calls.unpublish++;
    },
  };

  const transport: RoomTransport = {
    connect: async (url, token) => {
      calls.connect++;
      connectArgs.push({ url, token });
      if (options.failConnect) throw new Error("signal connection refused");
    },
    publishAudioTrack: async () => {
      calls.publish++;
      if (options.failPublish) throw new Error("publish timed out");
      return track;
    },
    disconnect: async () => {
      calls.disconnect++;
    },
  };

  return { transport, calls, connectArgs, frames, firstFrame };
}

/** Create a session wired to the fake transport and mock decoder. */
function createTestSession(
  fake: FakeTransport,
  decoderCommands: DecoderCommands,
  config: StreamerConfig = CONFIG
): PlaybackSession {
  return createPlaybackSession(config, {
    transport: fake.transport,
    issueToken: async (room) => `token-for-${room}`,
    decoderCommands,
  });
}

// ============================================================================
// TESTS -- connect / disconnect
// ============================================================================

test("connect joins with an issued token and publishes one track", async () => {
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands([]));

  await session.connect("lobby");

  assert.equal(session.getState(), "connected");
  assert.deepEqual(fake.connectArgs, [{ url: "wss://livekit.test", token: "token-for-lobby" }]);
  assert.equal(fake.calls.publish, 1);
});

test("connect is a no-op when already connected, and concurrent connects share one attempt", async () => {
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands([]));

  await Promise.all([session.connect("lobby"), session.connect("lobby")]);
  await session.connect("lobby");

  assert.equal(fake.calls.connect, 1);
  assert.equal(fake.calls.publish, 1);
});

test("a failed connect raises ConnectionError and leaves the session disconnected", async () => {
  const fake = createFakeTransport({ failConnect: true });
  const session = createTestSession(fake, mockCommands([]));

  await assert.rejects(() => session.connect("lobby"), (err) => {
    assert.ok(err instanceof ConnectionError);
    assert.ok(err.cause instanceof Error);
    assert.equal(err.cause.message, "signal connection refused");
    return true;
  });

  assert.equal(session.getState(), "disconnected");
  assert.equal(fake.calls.disconnect, 0);
});

test("a failed publish leaves the room it just joined", async () => {
  const fake = createFakeTransport({ failPublish: true });
  const session = createTestSession(fake, mockCommands([]));

  await assert.rejects(() => session.connect("lobby"), ConnectionError);

  assert.equal(session.getState(), "disconnected");
  assert.equal(fake.calls.disconnect, 1);
});

test("disconnect twice unpublishes and leaves exactly once", async () => {
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands([]));
  await session.connect("lobby");

  await session.disconnect();
  await session.disconnect();

  assert.equal(session.getState(), "disconnected");
  assert.equal(fake.calls.unpublish, 1);
  assert.equal(fake.calls.disconnect, 1);
});

test("disconnect without connect is a no-op, and the session cannot be reused afterwards", async () => {
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands([]));

  await session.disconnect();

  assert.equal(fake.calls.disconnect, 0);
  await assert.rejects(() => session.connect("lobby"), ConnectionError);
  assert.equal(fake.calls.connect, 0);
});

// ============================================================================
// TESTS -- play
// ============================================================================

test("play before connect raises SessionStateError", async (t) => {
  const { audioFile } = await createWorkspace(t);
  const session = createTestSession(createFakeTransport(), mockCommands(["--bytes", "960"]));

  await assert.rejects(() => session.play(audioFile), SessionStateError);
});

test("play pushes every frame in order and reports the probed duration", async (t) => {
  const { audioFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  // 2000 bytes = 1000 samples -> frames of 480, 480, 40 + 440 zeros
  const session = createTestSession(fake, mockCommands(["--bytes", "2000", "--chunk", "700"], ["--print", "0.041667"]));
  await session.connect("lobby");

  const result = await session.play(audioFile);

  assert.equal(result.filePath, audioFile);
  assert.equal(result.frames, 3);
  assert.equal(result.durationSeconds, 0.041667);
  assert.equal(fake.frames.length, 3);
  assert.equal(fake.frames[1].data[0], patternSample(480));
  assert.equal(fake.frames[2].data[39], patternSample(999));
  assert.equal(fake.frames[2].data[40], 0);
  assert.equal(session.isPlaying(), false);
});

test("two sequential plays of the same file push identical frame sequences", async (t) => {
  const { audioFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands(["--bytes", "5000", "--chunk", "1024"]));
  await session.connect("lobby");

  const first = await session.play(audioFile);
  const second = await session.play(audioFile);

  assert.equal(first.frames, 6);
  assert.equal(second.frames, 6);
  assert.equal(fake.calls.publish, 1);
  assert.deepEqual(fake.frames.slice(0, 6), fake.frames.slice(6));
});

test("a decoder failure raises StreamDecodeError, kills the decoder and keeps the session connected", async (t) => {
  const { audioFile, pidFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands(["--bytes", "300", "--exit", "1", "--pid-file", pidFile]));
  await session.connect("lobby");

  await assert.rejects(() => session.play(audioFile), StreamDecodeError);

  // The 300 decoded bytes still reach the sink as one padded frame
  assert.equal(fake.frames.length, 1);
  assert.equal(fake.frames[0].data[149], patternSample(149));
  assert.equal(fake.frames[0].data[150], 0);
  assert.equal(isProcessAlive(await readPid(pidFile)), false);
  assert.equal(session.getState(), "connected");
  assert.equal(session.isPlaying(), false);
});

test("a missing input file raises StreamDecodeError without spawning a decoder", async (t) => {
  const { dir } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands(["--bytes", "960"]));
  await session.connect("lobby");

  await assert.rejects(() => session.play(`${dir}/missing.mp3`), /Input file not readable/);
  assert.equal(fake.frames.length, 0);
  assert.equal(session.getState(), "connected");
});

test("a sink rejection raises SinkRejectionError and stops the decoder immediately", async (t) => {
  const { audioFile, pidFile } = await createWorkspace(t);
  const fake = createFakeTransport({ rejectFrameAt: 1 });
  const session = createTestSession(
    fake,
    mockCommands(["--bytes", "9600", "--chunk", "960", "--hang", "--pid-file", pidFile])
  );
  await session.connect("lobby");

  await assert.rejects(() => session.play(audioFile), (err) => {
    assert.ok(err instanceof SinkRejectionError);
    assert.equal(err.frameIndex, 1);
    return true;
  });

  assert.equal(fake.frames.length, 1);
  assert.equal(isProcessAlive(await readPid(pidFile)), false);
  assert.equal(session.getState(), "connected");
});

test("play while another play is running is rejected with PlaybackInProgressError", async (t) => {
  const { audioFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(
    fake,
    mockCommands(["--bytes", "4800", "--chunk", "960", "--delay-ms", "50"])
  );
  await session.connect("lobby");

  const running = session.play(audioFile);
  assert.equal(session.isPlaying(), true);
  await assert.rejects(() => session.play(audioFile), PlaybackInProgressError);

  const result = await running;
  assert.equal(result.frames, 5);
  assert.equal(fake.frames.length, 5);
});

test("disconnect during play cancels it and terminates the decoder before returning", async (t) => {
  const { audioFile, pidFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(fake, mockCommands(["--bytes", "1920", "--hang", "--pid-file", pidFile]));
  await session.connect("lobby");

  const playing = session.play(audioFile);
  const outcome = playing.then(
    () => null,
    (err: unknown) => err
  );
  await fake.firstFrame;

  await session.disconnect();

  assert.ok((await outcome) instanceof PlaybackCancelledError);
  assert.equal(isProcessAlive(await readPid(pidFile)), false);
  assert.equal(session.getState(), "disconnected");
  assert.equal(fake.calls.unpublish, 1);
  assert.equal(fake.calls.disconnect, 1);
});

test("disconnect during the duration probe kills the probe without waiting for its timeout", async (t) => {
  const { audioFile, pidFile } = await createWorkspace(t);
  const fake = createFakeTransport();
  const session = createTestSession(
    fake,
    mockCommands(["--bytes", "960"], ["--print", "", "--hang", "--pid-file", pidFile]),
    { ...CONFIG, probeTimeoutMs: 4_000 }
  );
  await session.connect("lobby");

  const outcome = session.play(audioFile).then(
    () => null,
    (err: unknown) => err
  );
  await waitForFile(pidFile);

  const startedAt = Date.now();
  await session.disconnect();
  const elapsedMs = Date.now() - startedAt;

  assert.ok(elapsedMs < 2_000, `disconnect took ${elapsedMs}ms`);
  assert.ok((await outcome) instanceof PlaybackCancelledError);
  assert.equal(isProcessAlive(await readPid(pidFile)), false);
  assert.equal(fake.frames.length, 0);
  assert.equal(session.getState(), "disconnected");
});
