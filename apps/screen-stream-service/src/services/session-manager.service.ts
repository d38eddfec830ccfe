/**
 * Session Manager Service
 * Start/stop control over a single capture session
 */
import { EventEmitter } from 'events';
import {
  PreviewImage,
  SessionFailure,
  SessionOverrides,
  SessionResult,
  SessionState,
  SessionStats,
  SessionStatus,
} from '../types/index.js';
import { ConfigError, describeError } from '../types/errors.js';
import { Config, validateConfig } from '../utils/config.js';
import { buildProducerCommand } from '../utils/producer-command.js';
import { CaptureSession, CaptureSessionEnd } from '../modules/CaptureSession.js';
import { SpawnFn } from '../modules/SubprocessPipe.js';
import { FrameDecoder } from '../modules/PreviewPipeline.js';
import { ActiveStream, ActiveStreamProvider } from '../modules/StreamBroadcastServer.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * SessionManager configuration
 */
export interface SessionManagerConfig {
  config: Config;
  /** Process factory handed to each session's pipe */
  spawnFn?: SpawnFn;
  /** Preview decoder handed to each session */
  decoder?: FrameDecoder;
  /** Platform the producer command is built for (default: process.platform) */
  platform?: NodeJS.Platform;
}

/**
 * SessionManager events
 */
export interface SessionManagerEvents {
  'status:update': (status: SessionStatus) => void;
  'preview': (image: PreviewImage) => void;
  'error': (error: Error) => void;
}

const EMPTY_STATS: SessionStats = {
  framesCaptured: 0,
  bytesCaptured: 0,
  desyncCount: 0,
  previewsDecoded: 0,
  previewsDropped: 0,
  subscribers: 0,
  producerPid: null,
  producerState: 'idle',
};

/**
 * Session Manager
 */
export class SessionManager extends EventEmitter implements ActiveStreamProvider {
  private config: Config;
  private spawnFn?: SpawnFn;
  private decoder?: FrameDecoder;
  private platform: NodeJS.Platform;

  private session: CaptureSession | null = null;
  private state: SessionState = 'idle';
  private startTime: Date | null = null;
  private lastError: string | null = null;
  private lastDiagnostic: string | null = null;
  private lastStats: SessionStats = EMPTY_STATS;

  constructor(options: SessionManagerConfig) {
    super();
    this.config = options.config;
    this.spawnFn = options.spawnFn;
    this.decoder = options.decoder;
    this.platform = options.platform ?? process.platform;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'SessionManager' });
      } catch {
        logger = null;
      }
    }
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Start a capture session. Never throws; failures are reported in the result.
   */
  async startSession(overrides: SessionOverrides = {}): Promise<SessionResult> {
    if (this.session || this.state === 'starting' || this.state === 'stopping') {
      return this.refuse('conflict', 'A capture session is already active');
    }

    let settings: Config;
    try {
      settings = this.applyOverrides(overrides);
    } catch (error) {
      if (error instanceof ConfigError) {
        return this.refuse('invalid', error.problems.join('; '));
      }
      throw error;
    }

    this.lastError = null;
    this.lastDiagnostic = null;
    this.lastStats = EMPTY_STATS;

    let session: CaptureSession;
    try {
      session = new CaptureSession({
        producer: buildProducerCommand(settings.capture, this.platform),
        maxBufferBytes: settings.scanner.maxBufferBytes,
        shutdownTimeoutMs: settings.shutdown.timeoutMs,
        previewEnabled: settings.preview.enabled,
        previewWidth: settings.preview.width,
        spawnFn: this.spawnFn,
        decoder: this.decoder,
      });
    } catch (error) {
      return this.failLaunch(error);
    }

    session.on('preview', (image) => this.emit('preview', image));
    session.on('ended', (end) => this.handleSessionEnded(session, end));

    // Registered before launch so an immediate producer exit is seen as this session's end
    this.session = session;
    this.setState('starting');

    try {
      await session.start();
    } catch (error) {
      this.session = null;
      return this.failLaunch(error);
    }

    if (this.session !== session) {
      return {
        success: false,
        status: this.getStatus(),
        error: this.lastError ?? 'Capture producer exited during startup',
        failure: 'launch-failed',
      };
    }

    this.startTime = new Date();
    this.setState('streaming');

    this.log('info', `Streaming (session ${session.id}, ${settings.capture.frameRate} fps, q=${settings.capture.quality})`);
    return { success: true, status: this.getStatus() };
  }

  /**
   * Stop the active session. Once this resolves the producer is no longer running.
   */
  async stopSession(): Promise<SessionResult> {
    const session = this.session;
    if (!session || this.state !== 'streaming') {
      return this.refuse('conflict', 'No capture session is active');
    }

    this.setState('stopping');
    const producerState = await session.stop();

    this.lastStats = session.getStats();
    this.session = null;
    this.startTime = null;
    this.setState('idle');

    this.log('info', `Capture session ${session.id} stopped (producer: ${producerState})`);
    return { success: true, status: this.getStatus() };
  }

  /**
   * Producer exited on its own: the session already tore itself down.
   * While streaming that is the end of the session, not a failure.
   */
  private handleSessionEnded(session: CaptureSession, end: CaptureSessionEnd): void {
    if (end.reason !== 'producer-exited' || this.session !== session) {
      return;
    }

    this.lastStats = session.getStats();
    this.lastDiagnostic = end.lastDiagnostic;
    this.session = null;
    this.startTime = null;

    if (this.state === 'starting') {
      // startSession reports this as a launch failure
      this.lastError = end.lastDiagnostic
        ? `Capture producer exited during startup: ${end.lastDiagnostic}`
        : 'Capture producer exited during startup';
      this.log('error', this.lastError);
      this.setState('error');
      this.reportError(new Error(this.lastError));
      return;
    }

    const detail = end.lastDiagnostic ? ` (last output: ${end.lastDiagnostic})` : '';
    this.log('info', `Capture producer exited after ${end.framesPublished} frames, session ${session.id} ended${detail}`);
    this.setState('idle');
  }

  /**
   * Merge overrides into the service configuration and validate the result
   * @throws ConfigError if any override is out of range
   */
  private applyOverrides(overrides: SessionOverrides): Config {
    const merged: Config = {
      ...this.config,
      capture: {
        ...this.config.capture,
        frameRate: overrides.frameRate ?? this.config.capture.frameRate,
        quality: overrides.quality ?? this.config.capture.quality,
        scaleWidth: overrides.scaleWidth ?? this.config.capture.scaleWidth,
      },
      preview: {
        ...this.config.preview,
        width: overrides.previewWidth ?? this.config.preview.width,
      },
    };

    validateConfig(merged);
    return merged;
  }

  private failLaunch(error: unknown): SessionResult {
    const message = describeError(error);
    this.log('error', `Failed to start capture session: ${message}`);
    this.lastError = message;
    this.setState('error');
    this.reportError(error instanceof Error ? error : new Error(message));
    return this.refuse('launch-failed', message);
  }

  private refuse(failure: SessionFailure, error: string): SessionResult {
    return { success: false, status: this.getStatus(), error, failure };
  }

  private reportError(error: Error): void {
    // EventEmitter throws on an unhandled 'error' event
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private setState(state: SessionState): void {
    this.state = state;
    this.emit('status:update', this.getStatus());
  }

  /**
   * What /stream attaches viewers to, or null when not streaming
   */
  getActiveStream(): ActiveStream | null {
    if (!this.session || this.state !== 'streaming' || !this.session.isActive()) {
      return null;
    }
    return this.session.getActiveStream();
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      sessionId: this.session?.id ?? null,
      startTime: this.startTime,
      uptime: this.startTime ? Math.floor((Date.now() - this.startTime.getTime()) / 1000) : 0,
      lastError: this.lastError,
      lastDiagnostic: this.lastDiagnostic,
      stats: this.session ? this.session.getStats() : { ...this.lastStats },
    };
  }

  isStreaming(): boolean {
    return this.state === 'streaming';
  }

  // Typed event emitter methods
  on<K extends keyof SessionManagerEvents>(
    event: K,
    listener: SessionManagerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SessionManagerEvents>(
    event: K,
    ...args: Parameters<SessionManagerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
