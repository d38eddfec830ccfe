/**
 * Capture Loop Module
 * Producer output -> frame scanner -> frame store (+ preview)
 */
import { EventEmitter } from 'events';
import { Frame } from '../types/index.js';
import { StreamDesyncError, describeError } from '../types/errors.js';
import { FrameBoundaryScanner } from './FrameBoundaryScanner.js';
import { FrameStore } from './LatestFrameStore.js';
import { PreviewPipeline } from './PreviewPipeline.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * Where the loop reads producer output from
 */
export interface ChunkSource {
  /** Next chunk, or null at end of stream / on abort */
  readChunk(signal?: AbortSignal): Promise<Buffer | null>;
}

/**
 * CaptureLoop configuration
 */
export interface CaptureLoopConfig {
  source: ChunkSource;
  scanner: FrameBoundaryScanner;
  store: FrameStore;
  /** Cancellation for this session */
  signal: AbortSignal;
  preview?: PreviewPipeline;
}

/**
 * Why the loop ended. Producer exit is a normal end of stream, not an error.
 */
export interface CaptureLoopResult {
  reason: 'producer-exited' | 'cancelled';
  framesPublished: number;
}

/**
 * CaptureLoop events
 */
export interface CaptureLoopEvents {
  'frame': (frame: Frame) => void;
  'desync': (error: StreamDesyncError) => void;
}

/**
 * CaptureLoop module
 */
export class CaptureLoop extends EventEmitter {
  private config: CaptureLoopConfig;
  private framesPublished: number = 0;
  private desyncCount: number = 0;
  private running: boolean = false;

  constructor(config: CaptureLoopConfig) {
    super();
    this.config = config;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'CaptureLoop' });
      } catch {
        logger = null;
      }
    }

    this.config.scanner.on('desync', (error) => {
      this.desyncCount++;
      this.log('warn', `Stream desync #${this.desyncCount}, resynchronizing`, {
        discardedBytes: error.discardedBytes,
        maxBufferBytes: error.maxBufferBytes,
      });
      this.emit('desync', error);
    });
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', message: string, ...args: unknown[]): void {
    if (logger) {
      logger[level](message, ...args);
    }
  }

  /**
   * Run until the producer's output ends or the session signal aborts
   */
  async run(): Promise<CaptureLoopResult> {
    if (this.running) {
      throw new Error('CaptureLoop is already running');
    }
    this.running = true;

    const { source, scanner, signal } = this.config;
    this.log('info', 'Capture loop started');

    try {
      while (!signal.aborted) {
        const chunk = await source.readChunk(signal);
        if (chunk === null) {
          break;
        }

        for (const frame of scanner.push(chunk)) {
          if (signal.aborted) {
            break;
          }
          this.publish(frame);
        }
      }
    } catch (error) {
      // A broken stdout pipe ends the stream the same way an exit does
      this.log('error', `Producer output failed: ${describeError(error)}`);
    } finally {
      this.running = false;
    }

    const reason = signal.aborted ? 'cancelled' : 'producer-exited';
    this.log('info', `Capture loop ended (${reason}) after ${this.framesPublished} frames`);

    return { reason, framesPublished: this.framesPublished };
  }

  private publish(frame: Frame): void {
    this.config.store.publish(frame);
    this.framesPublished++;

    if (this.framesPublished === 1) {
      this.log('info', `First frame received (${frame.data.length} bytes)`);
    }

    // Raw frame is already published; the preview may skip it
    this.config.preview?.offer(frame);
    this.emit('frame', frame);
  }

  getFramesPublished(): number {
    return this.framesPublished;
  }

  getDesyncCount(): number {
    return this.desyncCount;
  }

  isRunning(): boolean {
    return this.running;
  }

  // Typed event emitter methods
  on<K extends keyof CaptureLoopEvents>(
    event: K,
    listener: CaptureLoopEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof CaptureLoopEvents>(
    event: K,
    ...args: Parameters<CaptureLoopEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
