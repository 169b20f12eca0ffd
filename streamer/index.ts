#!/usr/bin/env node
/**
 * Entry point for the room audio streamer.
 *
 * Connects to a LiveKit room once, publishes an audio track, then streams an
 * audio file into the room every time the operator presses Enter. Much faster
 * than ingress-based approaches since the connection is reused across plays.
 *
 * Usage: tsx streamer/index.ts [input_file] [--room <name>] [--env-file <path>]
 *
 * Responsibilities:
 * - Parse CLI arguments and load configuration from .env.local + process env
 * - Validate the input file and prompt for the room name
 * - Connect the playback session and run the interactive control loop
 * - Disconnect on SIGINT/SIGTERM
 * - Map failures to exit codes (1 for configuration/connection errors)
 */

import { access, constants } from "fs/promises";
import { createInterface } from "readline";

import { mergeEnv, readEnv } from "../services/env.js";
import { createTokenIssuer } from "./access-token.js";
import { parseArgs } from "./cli-args.js";
import { loadStreamerConfig } from "./config.js";
import { promptLine, runControlLoop } from "./control-loop.js";
import { ConfigurationError, ConnectionError, describeError } from "./errors.js";
import { createLiveKitTransport } from "./livekit-transport.js";
import { createPlaybackSession } from "./playback-session.js";

import type { PlaybackSession } from "./playback-session.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Conventional exit codes for signal-triggered shutdown */
const SIGINT_EXIT_CODE = 130;
const SIGTERM_EXIT_CODE = 143;

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Run the streamer end to end.
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code
 */
async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const config = loadStreamerConfig(mergeEnv(await readEnv(args.envFile ?? undefined)));

  try {
    await access(args.inputFile, constants.R_OK);
  } catch {
    throw new ConfigurationError(`Input file not found: ${args.inputFile}`);
  }

  // Shared by the room prompt and the control loop
  const rl = createInterface({ input: process.stdin, crlfDelay: Infinity, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  try {
    const answer = args.room ?? (await promptLine(lines, process.stdout, "Enter LiveKit room name: "));
    const roomName = (answer ?? "").trim();
    if (!roomName) {
      throw new ConfigurationError("Room name cannot be empty");
    }

    const session = createPlaybackSession(config, {
      transport: createLiveKitTransport(),
      issueToken: createTokenIssuer(config),
    });
    registerSignalHandlers(session);

    await session.connect(roomName);

    return await runControlLoop(session, {
      filePath: args.inputFile,
      lines,
      output: process.stdout,
    });
  } finally {
    rl.close();
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Disconnect cleanly on SIGINT/SIGTERM. A second signal exits immediately.
 *
 * @param session - The session to tear down
 */
function registerSignalHandlers(session: PlaybackSession): void {
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    const code = signal === "SIGTERM" ? SIGTERM_EXIT_CODE : SIGINT_EXIT_CODE;
    if (shuttingDown) process.exit(code);
    shuttingDown = true;

    console.log(`\n[streamer] ${signal} received, disconnecting...`);
    session
      .disconnect()
      .catch((err: unknown) => {
        console.error(`[streamer] Disconnect failed: ${describeError(err)}`);
      })
      .finally(() => process.exit(code));
  };

  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}

/**
 * Map a fatal error to an exit code, logging it.
 *
 * @param err - The error that ended main()
 * @returns Exit code
 */
function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigurationError) {
    console.error(`[streamer] Configuration error: ${err.message}`);
  } else if (err instanceof ConnectionError) {
    console.error(`[streamer] Connection failed: ${describeError(err)}`);
  } else {
    console.error(`[streamer] Streamer failed: ${describeError(err)}`);
  }
  return 1;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => process.exit(exitCodeFor(err)));
