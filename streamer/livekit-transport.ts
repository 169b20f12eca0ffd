/**
 * LiveKit implementation of RoomTransport on the Node RTC SDK.
 *
 * Responsibilities:
 * - Join a LiveKit room with a pre-issued token
 * - Publish a microphone-sourced LocalAudioTrack backed by an AudioSource
 * - Forward frames to AudioSource.captureFrame (which queues and paces them)
 * - Unpublish the track and leave the room on shutdown
 */

import {
  AudioFrame as RtcAudioFrame,
  AudioSource,
  LocalAudioTrack,
  Room,
  TrackPublishOptions,
  TrackSource,
} from "@livekit/rtc-node";

import type { PublishedAudioTrack, RoomTransport } from "./transport.js";
import type { AudioFrame, OutputFormat } from "./types.js";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a RoomTransport backed by a fresh LiveKit Room.
 *
 * @returns A transport that is not yet connected
 */
export function createLiveKitTransport(): RoomTransport {
  const room = new Room();

  /**
   * Join the LiveKit room.
   *
   * @param url - LiveKit server URL
   * @param token - Access token granting roomJoin for the target room
   */
  async function connect(url: string, token: string): Promise<void> {
    await room.connect(url, token);
  }

  /**
   * Publish an audio track fed by a new AudioSource.
   *
   * @param trackName - Track name (e.g. "streamed-audio")
   * @param format - Sample rate and channel count of the AudioSource
   * @returns Handle for pushing frames and unpublishing
   * @throws Error if the room has no local participant (not connected)
   */
  async function publishAudioTrack(trackName: string, format: OutputFormat): Promise<PublishedAudioTrack> {
    const participant = room.localParticipant;
    if (!participant) {
      throw new Error("Room has no local participant. Connect before publishing.");
    }

    const source = new AudioSource(format.sampleRate, format.channels);
    const track = LocalAudioTrack.createAudioTrack(trackName, source);
    const publication = await participant.publishTrack(
      track,
      new TrackPublishOptions({ source: TrackSource.SOURCE_MICROPHONE })
    );

    const sid = publication.sid;
    if (!sid) {
      await source.close();
      throw new Error(`Track "${trackName}" was published without a sid`);
    }

    return {
      sid,
      captureFrame: (frame: AudioFrame) =>
        source.captureFrame(
          new RtcAudioFrame(frame.data, frame.sampleRate, frame.channels, frame.samplesPerChannel)
        ),
      unpublish: async () => {
        await participant.unpublishTrack(sid);
        await source.close();
      },
    };
  }

  /**
   * Leave the LiveKit room.
   */
  async function disconnect(): Promise<void> {
    await room.disconnect();
  }

  return { connect, publishAudioTrack, disconnect };
}
