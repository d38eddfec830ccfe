/**
 * Frame Boundary Scanner Module
 * Cuts an arbitrarily chunked MJPEG byte stream into complete JPEG frames
 */
import { EventEmitter } from 'events';
import { Frame } from '../types/index.js';
import { StreamDesyncError } from '../types/errors.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/** JPEG End Of Image marker */
export const EOI_MARKER = Buffer.from([0xff, 0xd9]);

/** Default accumulation cap: 10 MiB */
export const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

/** First allocation of the accumulation buffer */
const INITIAL_CAPACITY = 64 * 1024;

/**
 * FrameBoundaryScanner configuration
 */
export interface FrameBoundaryScannerConfig {
  /** Accumulation buffer cap in bytes (default: 10 MiB) */
  maxBufferBytes?: number;
}

/**
 * FrameBoundaryScanner events
 */
export interface FrameBoundaryScannerEvents {
  'desync': (error: StreamDesyncError) => void;
}

/**
 * Scanner statistics
 */
export interface ScannerStats {
  framesEmitted: number;
  bytesScanned: number;
  bufferedBytes: number;
  desyncCount: number;
}

/**
 * FrameBoundaryScanner module
 *
 * Every EOI marker ends a frame that starts right after the previous one, so
 * the stream must be a back-to-back concatenation of JPEGs. An FF D9 pair
 * inside entropy-coded data is taken as a boundary too; there is no JPEG
 * segment parsing to tell them apart.
 */
export class FrameBoundaryScanner extends EventEmitter {
  private maxBufferBytes: number;
  /** Growable storage; pending bytes are `buffer[head, tail)` */
  private buffer: Buffer = Buffer.alloc(0);
  private head: number = 0;
  private tail: number = 0;
  /** Offset in `buffer` up to which a marker has been searched for */
  private scannedTo: number = 0;
  private sequence: number = 0;
  private bytesScanned: number = 0;
  private desyncCount: number = 0;

  constructor(config: FrameBoundaryScannerConfig = {}) {
    super();
    this.maxBufferBytes = config.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'FrameBoundaryScanner' });
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
   * Feed one chunk of producer output
   * @returns Frames completed by this chunk, in stream order
   */
  push(chunk: Buffer): Frame[] {
    if (chunk.length === 0) {
      return [];
    }

    this.bytesScanned += chunk.length;
    this.append(chunk);

    const frames: Frame[] = [];
    const pending = this.buffer.subarray(0, this.tail);
    // Step back one byte: the marker may straddle the previous chunk's end
    let searchFrom = Math.max(this.head, this.scannedTo - 1);

    while (true) {
      const markerIndex = pending.indexOf(EOI_MARKER, searchFrom);
      if (markerIndex === -1) {
        break;
      }

      const end = markerIndex + EOI_MARKER.length;
      frames.push(this.createFrame(pending.subarray(this.head, end)));
      this.head = end;
      searchFrom = end;
    }

    this.scannedTo = this.tail;
    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
      this.scannedTo = 0;
    }

    if (this.getBufferedBytes() > this.maxBufferBytes) {
      this.discard();
    }

    return frames;
  }

  /**
   * Copy a chunk behind the pending bytes, compacting or doubling the storage
   * when it does not fit
   */
  private append(chunk: Buffer): void {
    if (this.tail + chunk.length > this.buffer.length) {
      const pendingLength = this.tail - this.head;
      const required = pendingLength + chunk.length;

      if (required <= this.buffer.length && this.head > 0) {
        this.buffer.copy(this.buffer, 0, this.head, this.tail);
      } else {
        const grown = Buffer.allocUnsafe(Math.max(required, this.buffer.length * 2, INITIAL_CAPACITY));
        this.buffer.copy(grown, 0, this.head, this.tail);
        this.buffer = grown;
      }

      this.scannedTo -= this.head;
      this.head = 0;
      this.tail = pendingLength;
    }

    chunk.copy(this.buffer, this.tail);
    this.tail += chunk.length;
  }

  /**
   * Lazily cut frames out of a chunk source
   */
  async *scan(source: AsyncIterable<Buffer>): AsyncGenerator<Frame> {
    for await (const chunk of source) {
      for (const frame of this.push(chunk)) {
        yield frame;
      }
    }
  }

  private createFrame(bytes: Buffer): Frame {
    this.sequence++;
    return Object.freeze({
      sequence: this.sequence,
      data: Buffer.from(bytes),
      capturedAt: Date.now(),
    });
  }

  private discard(): void {
    const error = new StreamDesyncError(this.getBufferedBytes(), this.maxBufferBytes);
    this.desyncCount++;
    this.release();

    this.log('warn', error.message);
    this.emit('desync', error);
  }

  /**
   * Drop any partial frame and start over
   */
  reset(): void {
    this.release();
  }

  private release(): void {
    this.buffer = Buffer.alloc(0);
    this.head = 0;
    this.tail = 0;
    this.scannedTo = 0;
  }

  /**
   * Bytes waiting for a frame boundary
   */
  getBufferedBytes(): number {
    return this.tail - this.head;
  }

  getStats(): ScannerStats {
    return {
      framesEmitted: this.sequence,
      bytesScanned: this.bytesScanned,
      bufferedBytes: this.getBufferedBytes(),
      desyncCount: this.desyncCount,
    };
  }

  // Typed event emitter methods
  on<K extends keyof FrameBoundaryScannerEvents>(
    event: K,
    listener: FrameBoundaryScannerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  emit<K extends keyof FrameBoundaryScannerEvents>(
    event: K,
    ...args: Parameters<FrameBoundaryScannerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
