/**
 * Environment file (.env) read service.
 *
 * Shared utility for everything that needs dotenv-style configuration:
 * - Read and parse an env file from disk with a configurable path
 * - Layer file values under the live process environment
 *
 * Values are returned as a record rather than written into process.env so
 * callers can pass configuration explicitly.
 */

import { readFile } from "fs/promises";
import { join } from "path";

import { parse } from "dotenv";

import { ConfigurationError } from "../streamer/errors.js";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default env file, relative to the working directory */
export const DEFAULT_ENV_FILE = ".env.local";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse an env file from disk.
 * A missing default file yields an empty record; an explicitly requested
 * file must be readable.
 *
 * @param envPath - Path to the env file. Defaults to process.cwd()/.env.local
 * @returns Parsed key-value pairs from the file
 * @throws ConfigurationError if the file cannot be read
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? join(process.cwd(), DEFAULT_ENV_FILE);

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (envPath === undefined && isMissingFile(err)) return {};
    throw new ConfigurationError(`Cannot read env file ${filePath}`, { cause: err });
  }
  return parse(content);
}

/**
 * Layer env file values under the process environment.
 * Variables already set in the process win over the file.
 *
 * @param fileEnv - Values read from the env file
 * @param processEnv - The live environment (defaults to process.env)
 * @returns Merged record with undefined process values dropped
 */
export function mergeEnv(fileEnv: EnvRecord, processEnv: NodeJS.ProcessEnv = process.env): EnvRecord {
  const merged: EnvRecord = { ...fileEnv };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** True for the ENOENT error fs raises on a missing path */
function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
