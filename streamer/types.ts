/**
 * Shared types for the room audio streamer.
 *
 * Defines the DTOs and interfaces used across the streaming pipeline:
 * - Output PCM format and frame representation
 * - Streamer configuration
 * - Playback requests and results
 * - Session connection state
 */

// ============================================================================
// AUDIO INTERFACES
// ============================================================================

/**
 * Target PCM format the decoder produces and the published track expects.
 * Sample width is always 16-bit signed little-endian.
 */
export interface OutputFormat {
  /** Sample rate in Hz (e.g. 24000) */
  sampleRate: number;
  /** Interleaved channel count (1 = mono) */
  channels: number;
}

/**
 * One fixed-duration slice of interleaved 16-bit PCM.
 * Frames are handed to the sink and never touched again by the producer.
 */
export interface AudioFrame {
  /** Interleaved samples, `samplesPerChannel * channels` long */
  data: Int16Array;
  sampleRate: number;
  channels: number;
  samplesPerChannel: number;
}

/** Bytes per 16-bit sample */
export const BYTES_PER_SAMPLE = 2;

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

/**
 * Complete streamer configuration.
 * Built once by `loadStreamerConfig` and passed explicitly into the session.
 */
export interface StreamerConfig {
  /** WebSocket URL of the LiveKit server (e.g. "wss://example.livekit.cloud") */
  livekitUrl: string;
  /** LiveKit API key used to sign access tokens */
  apiKey: string;
  /** LiveKit API secret used to sign access tokens */
  apiSecret: string;
  /** PCM format for decoding and the published track */
  format: OutputFormat;
  /** Duration of each frame pushed to the sink (ms) */
  frameDurationMs: number;
  /** Name of the published audio track */
  trackName: string;
  /** Display name of the streaming participant */
  participantName: string;
  /** Prefix for the random participant identity */
  identityPrefix: string;
  /** Max time to wait for ffprobe before giving up on the duration (ms) */
  probeTimeoutMs: number;
  /** Max time the decoder may go without producing output before it is killed (ms) */
  decodeStallTimeoutMs: number;
}

// ============================================================================
// PLAYBACK INTERFACES
// ============================================================================

/** One request to decode a file into the target format. Immutable. */
export interface PlaybackRequest {
  readonly filePath: string;
  readonly format: OutputFormat;
}

/** Summary of one completed playback */
export interface PlaybackResult {
  filePath: string;
  /** Number of frames accepted by the sink */
  frames: number;
  /** Duration reported by the probe, or null if it could not be determined */
  durationSeconds: number | null;
  /** Wall-clock time spent inside play() (ms) */
  elapsedMs: number;
}

/** Connection state of a playback session */
export type ConnectionState = "disconnected" | "connecting" | "connected";
