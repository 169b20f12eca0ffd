/**
 * Interactive control loop for on-demand playback.
 *
 * Reads one line at a time: Enter (or anything other than the quit token)
 * plays the configured file and blocks until playback finishes; "q" quits.
 * A failed playback is reported and the loop keeps going.
 *
 * Responsibilities:
 * - Prompt for and parse operator commands
 * - Run playbacks strictly one after another
 * - Report play() failures with file path and cause, then return to the prompt
 * - Disconnect the session exactly once on quit or end of input
 *
 * Input arrives as an iterator of lines owned by the caller, so one reader can
 * serve earlier prompts and the loop without losing buffered lines.
 */

import { describeError } from "./errors.js";

import type { Writable } from "stream";
import type { PlaybackSession } from "./playback-session.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Prompt shown before each command */
export const PLAY_PROMPT = "\nPress Enter to play audio... or 'q' to quit: ";

/** Token that ends the loop (case-insensitive) */
const QUIT_TOKEN = "q";

// ============================================================================
// TYPES
// ============================================================================

/** Control loop states */
export type ControlLoopStatus = "awaiting_input" | "playing" | "done";

/** A parsed operator command */
export type ControlCommand = "play" | "quit";

/** I/O and target file for the loop */
export interface ControlLoopOptions {
  /** File played on every play command */
  filePath: string;
  /** Command lines, e.g. from a readline interface over process.stdin */
  lines: AsyncIterator<string>;
  /** Where prompts and playback reports are written (e.g. process.stdout) */
  output: Writable;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Run the interactive loop until the operator quits or input ends.
 *
 * @param session - A connected playback session
 * @param options - Target file, input lines and output stream
 * @returns Process exit code (0 on clean quit)
 */
export async function runControlLoop(session: PlaybackSession, options: ControlLoopOptions): Promise<number> {
  const { filePath, lines, output } = options;

  let status: ControlLoopStatus = "awaiting_input";

  try {
    while (status !== "done") {
      output.write(PLAY_PROMPT);
      const next = await lines.next();

      // End of input behaves like quit
      const command: ControlCommand = next.done ? "quit" : parseCommand(next.value);
      status = handleStateTransition(status, command);
      if (status !== "playing") continue;

      try {
        const result = await session.play(filePath);
        output.write(`Played ${result.filePath} (${result.frames} frames)\n`);
      } catch (err) {
        console.error(`[streamer] Playback failed for ${filePath}: ${describeError(err)}`);
        output.write(`Playback failed for ${filePath}: ${describeError(err)}\n`);
      }
      status = handleStateTransition(status, "finished");
    }
  } finally {
    await session.disconnect();
  }

  return 0;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Write a question and read the next line as the answer.
 *
 * @param lines - Input lines shared with later readers
 * @param output - Where the question is written
 * @param question - Prompt text
 * @returns The answer, or null at end of input
 */
export async function promptLine(
  lines: AsyncIterator<string>,
  output: Writable,
  question: string
): Promise<string | null> {
  output.write(question);
  const next = await lines.next();
  return next.done ? null : next.value;
}

/**
 * Interpret one line of operator input.
 *
 * @param line - Raw input line
 * @returns "quit" for the quit token (any case, surrounding whitespace ignored), otherwise "play"
 */
export function parseCommand(line: string): ControlCommand {
  return line.trim().toLowerCase() === QUIT_TOKEN ? "quit" : "play";
}

/**
 * Pure function that computes the next loop state from the current state and an event.
 *
 * @param from - Current state
 * @param event - A command, or "finished" when a playback returns
 * @returns The next state
 */
export function handleStateTransition(
  from: ControlLoopStatus,
  event: ControlCommand | "finished"
): ControlLoopStatus {
  switch (from) {
    case "awaiting_input":
      if (event === "play") return "playing";
      if (event === "quit") return "done";
      return from;
    case "playing":
      return event === "finished" ? "awaiting_input" : from;
    case "done":
      return from;
  }
}
