/**
 * Error kinds raised along the capture and streaming path
 */

/**
 * The producer process could not be started (missing executable, spawn failure,
 * unsupported platform). Fatal to session start.
 */
export class LaunchError extends Error {
  readonly command: string;

  constructor(message: string, command: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LaunchError';
    this.command = command;
  }
}

/**
 * The scanner's accumulation buffer grew past its cap without a frame boundary.
 * Recovered by discarding the buffer; the session keeps running.
 */
export class StreamDesyncError extends Error {
  readonly discardedBytes: number;
  readonly maxBufferBytes: number;

  constructor(discardedBytes: number, maxBufferBytes: number) {
    super(`No frame boundary within ${maxBufferBytes} bytes, discarded ${discardedBytes} buffered bytes`);
    this.name = 'StreamDesyncError';
    this.discardedBytes = discardedBytes;
    this.maxBufferBytes = maxBufferBytes;
  }
}

/**
 * A viewer connection failed mid-write. Ends that connection's loop only.
 */
export class ConnectionAbortedError extends Error {
  readonly subscriberId: number;

  constructor(subscriberId: number, options?: { cause?: unknown }) {
    super(`Stream connection ${subscriberId} aborted`, options);
    this.name = 'ConnectionAbortedError';
    this.subscriberId = subscriberId;
  }
}

/**
 * The producer ignored the graceful quit request and had to be killed.
 */
export class ShutdownTimeoutError extends Error {
  readonly pid: number | undefined;
  readonly timeoutMs: number;

  constructor(pid: number | undefined, timeoutMs: number) {
    super(`Producer (PID: ${pid ?? 'unknown'}) did not exit within ${timeoutMs}ms of quit request`);
    this.name = 'ShutdownTimeoutError';
    this.pid = pid;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A frame could not be turned into a preview image.
 */
export class PreviewDecodeError extends Error {
  readonly sequence: number;

  constructor(sequence: number, message: string, options?: { cause?: unknown }) {
    super(`Preview decode failed for frame ${sequence}: ${message}`, options);
    this.name = 'PreviewDecodeError';
    this.sequence = sequence;
  }
}

/**
 * Invalid configuration or session overrides.
 */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration validation failed:\n${problems.join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
