/**
 * Capture Session
 * One producer run: pipe, scanner, frame store, preview and capture loop
 * sharing a single cancellation signal
 */
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { PreviewImage, ProducerState, SessionConfig, SessionStats } from '../types/index.js';
import { describeError } from '../types/errors.js';
import { SubprocessPipe, SpawnFn } from './SubprocessPipe.js';
import { FrameBoundaryScanner } from './FrameBoundaryScanner.js';
import { LatestFrameStore } from './LatestFrameStore.js';
import { CaptureLoop, CaptureLoopResult } from './CaptureLoop.js';
import { FrameDecoder, PreviewPipeline } from './PreviewPipeline.js';
import { ActiveStream } from './StreamBroadcastServer.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

export interface CaptureSessionConfig extends SessionConfig {
  spawnFn?: SpawnFn;
  decoder?: FrameDecoder;
}

export interface CaptureSessionEnd extends CaptureLoopResult {
  producerState: ProducerState;
  /** Last producer diagnostic line, if any */
  lastDiagnostic: string | null;
}

/**
 * CaptureSession events
 */
export interface CaptureSessionEvents {
  'preview': (image: PreviewImage) => void;
  'ended': (end: CaptureSessionEnd) => void;
}

export class CaptureSession extends EventEmitter {
  readonly id: string = randomUUID();

  private config: CaptureSessionConfig;
  private controller: AbortController = new AbortController();
  private pipe: SubprocessPipe;
  private scanner: FrameBoundaryScanner;
  private store: LatestFrameStore = new LatestFrameStore();
  private preview: PreviewPipeline | null = null;
  private loop: CaptureLoop;

  private started: boolean = false;
  private viewers: number = 0;
  private loopPromise: Promise<void> = Promise.resolve();
  private shutdownPromise: Promise<ProducerState> | null = null;

  constructor(config: CaptureSessionConfig) {
    super();
    this.config = config;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'CaptureSession' });
      } catch {
        logger = null;
      }
    }

    this.pipe = new SubprocessPipe({
      producer: config.producer,
      spawnFn: config.spawnFn,
    });

    this.scanner = new FrameBoundaryScanner({ maxBufferBytes: config.maxBufferBytes });

    if (config.previewEnabled) {
      this.preview = new PreviewPipeline({
        targetWidth: config.previewWidth,
        decoder: config.decoder,
        onPreview: (image) => this.emit('preview', image),
      });
    }

    this.loop = new CaptureLoop({
      source: this.pipe,
      scanner: this.scanner,
      store: this.store,
      signal: this.controller.signal,
      preview: this.preview ?? undefined,
    });
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Launch the producer and start capturing in the background
   * @throws LaunchError if the producer cannot be started
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error(`Capture session ${this.id} was already started`);
    }
    this.started = true;

    await this.pipe.start();

    this.log('info', `Capture session ${this.id} started (producer PID: ${this.pipe.pid})`);
    this.loopPromise = this.runLoop();
  }

  private async runLoop(): Promise<void> {
    let result: CaptureLoopResult;
    try {
      result = await this.loop.run();
    } catch (error) {
      this.log('error', `Capture loop failed: ${describeError(error)}`);
      result = { reason: 'producer-exited', framesPublished: this.loop.getFramesPublished() };
    }

    // Producer exit: the session tears itself down
    const producerState = await this.shutdown();

    const tail = this.pipe.getStderrTail();
    this.emit('ended', {
      ...result,
      producerState,
      lastDiagnostic: tail.length > 0 ? tail[tail.length - 1] : null,
    });
  }

  private shutdown(): Promise<ProducerState> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  private async doShutdown(): Promise<ProducerState> {
    this.controller.abort();
    await this.preview?.close();

    const producerState = await this.pipe.requestStop(this.config.shutdownTimeoutMs);
    await this.pipe.settled();
    this.store.clear();

    this.log('info', `Capture session ${this.id} shut down (producer: ${producerState})`);
    return producerState;
  }

  /**
   * Cancel capture, stop the producer and wait for the capture loop to finish.
   * Safe to call more than once.
   */
  async stop(): Promise<ProducerState> {
    const producerState = await this.shutdown();
    await this.loopPromise;
    return producerState;
  }

  /**
   * What the broadcast server streams from
   */
  getActiveStream(): ActiveStream {
    return {
      store: this.store,
      signal: this.controller.signal,
      trackViewer: () => {
        this.viewers++;
        let attached = true;
        return () => {
          if (attached) {
            attached = false;
            this.viewers--;
          }
        };
      },
    };
  }

  isActive(): boolean {
    return this.started && !this.controller.signal.aborted;
  }

  getStats(): SessionStats {
    const preview = this.preview?.getStats();
    return {
      framesCaptured: this.loop.getFramesPublished(),
      bytesCaptured: this.pipe.getBytesRead(),
      desyncCount: this.loop.getDesyncCount(),
      previewsDecoded: preview?.decoded ?? 0,
      previewsDropped: preview?.dropped ?? 0,
      subscribers: this.viewers,
      producerPid: this.pipe.pid,
      producerState: this.pipe.getState(),
    };
  }

  // Typed event emitter methods
  on<K extends keyof CaptureSessionEvents>(
    event: K,
    listener: CaptureSessionEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof CaptureSessionEvents>(
    event: K,
    ...args: Parameters<CaptureSessionEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
