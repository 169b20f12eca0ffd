/**
 * Room-join token issuance for the streaming participant.
 *
 * Each connect gets a fresh random identity so repeated runs never collide
 * with a participant that is still leaving the room.
 */

import { randomUUID } from "crypto";
import { AccessToken } from "livekit-server-sdk";

import type { TokenIssuer } from "./transport.js";
import type { StreamerConfig } from "./types.js";

/**
 * Create a TokenIssuer that signs LiveKit access tokens with the configured key pair.
 *
 * @param config - Streamer configuration (API key/secret, identity prefix, display name)
 * @returns Function issuing a roomJoin + canPublish JWT for a room
 */
export function createTokenIssuer(
  config: Pick<StreamerConfig, "apiKey" | "apiSecret" | "identityPrefix" | "participantName">
): TokenIssuer {
  return async (roomName: string) => {
    const token = new AccessToken(config.apiKey, config.apiSecret, {
      identity: `${config.identityPrefix}${randomUUID()}`,
      name: config.participantName,
    });
    token.addGrant({ roomJoin: true, room: roomName, canPublish: true, canSubscribe: false });
    return token.toJwt();
  };
}
