/**
 * Error taxonomy for the streamer.
 *
 * Configuration and connection errors are fatal for the process. Everything
 * scoped to a single play() call is recoverable and leaves the session connected.
 */

// ============================================================================
// BASE ERROR
// ============================================================================

/** Base class for every error raised by the streamer */
export class StreamerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// FATAL ERRORS
// ============================================================================

/** Missing connection parameters, missing input file, invalid overrides */
export class ConfigurationError extends StreamerError {}

/** Room connect or track publish failed */
export class ConnectionError extends StreamerError {}

// ============================================================================
// RECOVERABLE ERRORS
// ============================================================================

/** Operation not allowed in the session's current state (e.g. play before connect) */
export class SessionStateError extends StreamerError {}

/** play() called while another play() is still running */
export class PlaybackInProgressError extends SessionStateError {}

/** Decoder process failed to start, exited non-zero, stalled or could not be read */
export class StreamDecodeError extends StreamerError {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Duration probe failed. Only ever logged as a warning */
export class DurationProbeError extends StreamerError {}

/** The sink refused a frame */
export class SinkRejectionError extends StreamerError {
  constructor(
    message: string,
    readonly frameIndex: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** play() was aborted, usually by disconnect() */
export class PlaybackCancelledError extends StreamerError {}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Render an error and its cause chain on one line.
 *
 * @param err - Anything thrown
 * @returns e.g. "StreamDecodeError: decoder exited with code 1 <- Error: boom"
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;

  // Cap the depth in case of a cyclic cause chain
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }

  return parts.join(" <- ");
}
