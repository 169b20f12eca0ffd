/**
 * Builds the StreamerConfig from an environment record.
 *
 * Connection credentials are required. Audio format and frame duration
 * can be overridden; everything else uses the defaults below.
 */

import { DEFAULT_DECODE_STALL_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS } from "./decoder.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_FRAME_DURATION_MS } from "./frame-chunker.js";

import type { EnvRecord } from "../services/env.js";
import type { StreamerConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Env keys that must be present and non-empty */
const REQUIRED_KEYS = ["LIVEKIT_URL", "LIVEKIT_API_KEY", "LIVEKIT_API_SECRET"] as const;

/** Defaults for everything not read from the environment */
export const DEFAULT_STREAMER_SETTINGS = {
  format: { sampleRate: 24000, channels: 1 },
  frameDurationMs: DEFAULT_FRAME_DURATION_MS,
  trackName: "streamed-audio",
  participantName: "Audio Streamer",
  identityPrefix: "external-agent-ingress",
  probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  decodeStallTimeoutMs: DEFAULT_DECODE_STALL_TIMEOUT_MS,
} satisfies Omit<StreamerConfig, "livekitUrl" | "apiKey" | "apiSecret">;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Validate an environment record and build the streamer configuration.
 *
 * @param env - Merged environment (env file + process)
 * @returns Complete configuration
 * @throws ConfigurationError listing every missing credential, or naming an invalid override
 */
export function loadStreamerConfig(env: EnvRecord): StreamerConfig {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing LiveKit credentials in environment: ${missing.join(", ")}`);
  }

  const defaults = DEFAULT_STREAMER_SETTINGS;

  return {
    ...defaults,
    livekitUrl: env.LIVEKIT_URL.trim(),
    apiKey: env.LIVEKIT_API_KEY.trim(),
    apiSecret: env.LIVEKIT_API_SECRET.trim(),
    format: {
      sampleRate: readPositiveInt(env, "STREAMER_SAMPLE_RATE", defaults.format.sampleRate),
      channels: readPositiveInt(env, "STREAMER_CHANNELS", defaults.format.channels),
    },
    frameDurationMs: readPositiveInt(env, "STREAMER_FRAME_MS", defaults.frameDurationMs),
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read an optional positive integer override.
 *
 * @param env - Environment record
 * @param key - Variable name
 * @param fallback - Value used when the variable is unset or empty
 * @returns The parsed value or the fallback
 * @throws ConfigurationError if the value is not a positive integer
 */
function readPositiveInt(env: EnvRecord, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}
