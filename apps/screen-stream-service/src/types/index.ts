/**
 * Core type definitions for Screen Stream Service
 */

/**
 * A complete JPEG frame cut from the producer's byte stream.
 * Frozen on creation; consumers hold their own reference.
 */
export interface Frame {
  /** Per-scanner sequence number, starting at 1 */
  readonly sequence: number;
  /** JPEG bytes, ending with the EOI marker */
  readonly data: Buffer;
  /** Epoch milliseconds when the frame was cut */
  readonly capturedAt: number;
}

/**
 * Command line used to launch the capture producer
 */
export interface ProducerCommand {
  /** Executable name or path */
  command: string;
  /** Arguments passed verbatim */
  args: string[];
}

/**
 * Producer lifecycle states
 * running -> stop-requested -> exited | force-killed
 */
export type ProducerState = 'idle' | 'running' | 'stop-requested' | 'exited' | 'force-killed';

/**
 * Capture settings the producer command is built from
 */
export interface CaptureSettings {
  /** FFmpeg executable */
  ffmpegPath: string;
  /** FFmpeg -loglevel */
  logLevel: string;
  /** Target frames per second */
  frameRate: number;
  /** JPEG quality for -q:v (2-31, lower is better) */
  quality: number;
  /** Output width in pixels, 0 keeps the native size */
  scaleWidth: number;
  /** Grab input (X display, "desktop", avfoundation index); platform default when empty */
  input: string;
}

/**
 * Decoded preview handed to the display observer
 */
export interface PreviewImage {
  /** Sequence of the frame it was decoded from */
  sequence: number;
  /** Preview width in pixels */
  width: number;
  /** Preview height in pixels */
  height: number;
  /** Bytes per pixel in `data` */
  channels: number;
  /** Width of the captured frame */
  sourceWidth: number;
  /** Height of the captured frame */
  sourceHeight: number;
  /** Raw interleaved pixels, row major, `width * height * channels` bytes */
  data: Buffer;
}

/**
 * Everything a single capture session needs
 */
export interface SessionConfig {
  /** Producer invocation */
  producer: ProducerCommand;
  /** Accumulation buffer cap in bytes */
  maxBufferBytes: number;
  /** Graceful producer shutdown timeout in milliseconds */
  shutdownTimeoutMs: number;
  /** Decode previews for the display observer */
  previewEnabled: boolean;
  /** Target preview width in pixels */
  previewWidth: number;
}

/**
 * Session state as seen by the control surface
 */
export type SessionState = 'idle' | 'starting' | 'streaming' | 'stopping' | 'error';

/**
 * Session statistics
 */
export interface SessionStats {
  /** Frames published to the frame store */
  framesCaptured: number;
  /** Raw bytes read from the producer */
  bytesCaptured: number;
  /** Accumulation buffer resets */
  desyncCount: number;
  /** Previews delivered to the observer */
  previewsDecoded: number;
  /** Frames skipped by the preview path because a decode was in flight */
  previewsDropped: number;
  /** Currently connected stream viewers */
  subscribers: number;
  /** Producer process id */
  producerPid: number | null;
  /** Producer lifecycle state */
  producerState: ProducerState;
}

/**
 * Session status
 */
export interface SessionStatus {
  /** Current state */
  state: SessionState;
  /** Active session id */
  sessionId: string | null;
  /** Start time of the active session */
  startTime: Date | null;
  /** Uptime in seconds */
  uptime: number;
  /** Last error message, if any */
  lastError: string | null;
  /** Last producer stderr line of the previous session, for information only */
  lastDiagnostic: string | null;
  /** Statistics of the active (or last) session */
  stats: SessionStats;
}

/**
 * Why a control request was refused
 * - conflict: a session is already active (start) or none is (stop)
 * - invalid: overrides failed validation
 * - launch-failed: the producer could not be started
 */
export type SessionFailure = 'conflict' | 'invalid' | 'launch-failed';

/**
 * Result returned by the session control surface
 */
export interface SessionResult {
  success: boolean;
  status: SessionStatus;
  error?: string;
  failure?: SessionFailure;
}

/**
 * Per-session overrides accepted by the control surface
 */
export interface SessionOverrides {
  frameRate?: number;
  quality?: number;
  scaleWidth?: number;
  previewWidth?: number;
}
