/**
 * Splits a raw PCM byte stream into fixed-duration audio frames.
 *
 * Responsibilities:
 * - Re-block arbitrarily sized decoder chunks into exact frame-sized slices
 * - Zero-pad the final partial frame with silence
 * - Flush the pending partial frame before re-throwing a late upstream error
 * - Convert 16-bit signed little-endian bytes into Int16Array samples
 */

import { BYTES_PER_SAMPLE } from "./types.js";

import type { AudioFrame, OutputFormat } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default frame duration pushed to the sink (ms) */
export const DEFAULT_FRAME_DURATION_MS = 20;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Number of samples per channel in one frame.
 *
 * @param format - Target PCM format
 * @param frameDurationMs - Frame duration in milliseconds
 * @returns round(sampleRate * frameDurationMs / 1000), e.g. 480 for 24kHz at 20ms
 */
export function frameSamplesFor(format: OutputFormat, frameDurationMs: number): number {
  return Math.round((format.sampleRate * frameDurationMs) / 1000);
}

/**
 * Lazily chunk a PCM byte stream into fixed-duration frames.
 *
 * Every frame holds exactly `frameSamples * channels` samples. A non-empty
 * remainder at end of stream is padded with zeros and emitted as the last frame.
 * If the source throws, the remainder is emitted first and the error re-thrown.
 *
 * @param source - Raw s16le PCM chunks of any size
 * @param format - Format the bytes were decoded to
 * @param frameDurationMs - Frame duration (default 20ms)
 * @returns Forward-only sequence of frames
 * @throws Error if the frame duration yields zero samples per frame
 */
export async function* chunkFrames(
  source: AsyncIterable<Buffer>,
  format: OutputFormat,
  frameDurationMs: number = DEFAULT_FRAME_DURATION_MS
): AsyncGenerator<AudioFrame> {
  const samplesPerChannel = frameSamplesFor(format, frameDurationMs);
  if (samplesPerChannel <= 0 || format.channels <= 0) {
    throw new Error(
      `Invalid frame size: ${format.sampleRate}Hz x ${format.channels}ch at ${frameDurationMs}ms`
    );
  }

  const frameBytes = samplesPerChannel * format.channels * BYTES_PER_SAMPLE;
  let pending: Buffer = Buffer.alloc(0);

  try {
    for await (const chunk of source) {
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);

      while (pending.length >= frameBytes) {
        yield toFrame(pending.subarray(0, frameBytes), format, samplesPerChannel);
        pending = pending.subarray(frameBytes);
      }
    }
  } catch (err) {
    // Already-decoded audio goes out before the error does
    if (pending.length > 0) {
      yield toFrame(pending, format, samplesPerChannel);
    }
    throw err;
  }

  if (pending.length > 0) {
    yield toFrame(pending, format, samplesPerChannel);
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Build one frame from up to `frameBytes` bytes, zero-filling any shortfall.
 *
 * @param bytes - Raw s16le bytes, at most one frame long
 * @param format - PCM format of the bytes
 * @param samplesPerChannel - Samples per channel in a full frame
 * @returns A frame that owns its own sample memory
 */
function toFrame(bytes: Buffer, format: OutputFormat, samplesPerChannel: number): AudioFrame {
  const sampleCount = samplesPerChannel * format.channels;
  const padded = Buffer.alloc(sampleCount * BYTES_PER_SAMPLE);
  bytes.copy(padded);

  const data = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    data[i] = padded.readInt16LE(i * BYTES_PER_SAMPLE);
  }

  return {
    data,
    sampleRate: format.sampleRate,
    channels: format.channels,
    samplesPerChannel,
  };
}
