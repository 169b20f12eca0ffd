/**
 * RoomTransport interface for abstracting the real-time media room.
 *
 * The playback session only ever connects, publishes one audio track and
 * disconnects, so any media transport that can do those three things can
 * carry the stream. Implemented by livekit-transport.ts; tests use an
 * in-memory fake.
 */

import type { AudioFrame, OutputFormat } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * A published audio track: the sink frames are pushed into.
 */
export interface PublishedAudioTrack {
  /** Server-assigned track id */
  readonly sid: string;

  /**
   * Hand one frame to the track for real-time transmission.
   * Resolves when the frame has been accepted. The returned promise is the
   * backpressure that paces playback to real time.
   *
   * @param frame - The frame to send
   */
  captureFrame: (frame: AudioFrame) => Promise<void>;

  /**
   * Stop publishing the track and release its audio source.
   */
  unpublish: () => Promise<void>;
}

/**
 * Connection to a media room.
 */
export interface RoomTransport {
  /**
   * Join the room.
   *
   * @param url - Server URL
   * @param token - Signed access token for the room
   */
  connect: (url: string, token: string) => Promise<void>;

  /**
   * Publish a microphone-sourced audio track fed by captureFrame().
   *
   * @param trackName - Name shown to other participants
   * @param format - Sample rate and channel count of every frame
   * @returns Handle to the published track
   */
  publishAudioTrack: (trackName: string, format: OutputFormat) => Promise<PublishedAudioTrack>;

  /**
   * Leave the room.
   */
  disconnect: () => Promise<void>;
}

/**
 * Issues a room-join token for the given room.
 */
export type TokenIssuer = (roomName: string) => Promise<string>;
