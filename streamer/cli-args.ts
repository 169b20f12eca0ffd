/**
 * Command-line argument parsing for the streamer entry point.
 */

import { ConfigurationError } from "./errors.js";

/** File played when no input file is given */
export const DEFAULT_INPUT_FILE = "test_data/hello_world.mp3";

/** Parsed command-line arguments */
export interface CliArgs {
  inputFile: string;
  /** Room name, or null to prompt for it */
  room: string | null;
  /** Env file path, or null for the default .env.local */
  envFile: string | null;
}

/**
 * Parse command-line arguments.
 * Accepts one optional positional input file plus `--room <name>` and `--env-file <path>`.
 *
 * @param argv - Arguments after the script name
 * @returns Parsed arguments with defaults applied
 * @throws ConfigurationError on an unknown flag, a flag missing its value, or extra positionals
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { inputFile: DEFAULT_INPUT_FILE, room: null, envFile: null };
  let sawInput = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--room" || arg === "--env-file") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`${arg} requires a value`);
      }
      if (arg === "--room") args.room = value;
      else args.envFile = value;
      i++;
    } else if (arg.startsWith("--")) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else if (!sawInput) {
      args.inputFile = arg;
      sawInput = true;
    } else {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }
  }

  return args;
}
