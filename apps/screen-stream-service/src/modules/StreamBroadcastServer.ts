/**
 * Stream Broadcast Server Module
 * Serves the MJPEG endpoint: each viewer runs its own pacing loop over the
 * latest frame, so slow viewers never hold back capture or each other
 */
import { Request, Response } from 'express';
import { Frame } from '../types/index.js';
import { ConnectionAbortedError, describeError } from '../types/errors.js';
import { FrameStore } from './LatestFrameStore.js';
import { linkedAbortController, sleep } from '../utils/async.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/** Multipart boundary token */
export const MJPEG_BOUNDARY = 'frame';

/**
 * The capture a viewer is attached to
 */
export interface ActiveStream {
  store: FrameStore;
  /** Aborts when the capture session stops */
  signal: AbortSignal;
  /** Called when a viewer attaches; the returned function detaches it */
  trackViewer?: () => () => void;
}

export interface ActiveStreamProvider {
  getActiveStream(): ActiveStream | null;
}

/**
 * StreamBroadcastServer configuration
 */
export interface StreamBroadcastServerConfig {
  source: ActiveStreamProvider;
  /** Minimum time between two frames to one viewer (default: 66, about 15 fps) */
  minIntervalMs?: number;
  /** Sleep between checks while there is nothing new to send (default: 10) */
  idlePollMs?: number;
}

interface StreamSubscriber {
  id: number;
  res: Response;
  controller: AbortController;
  connectedAt: number;
  lastSentAt: number;
  lastSequence: number;
  framesSent: number;
}

export interface BroadcastStats {
  subscribers: number;
  totalConnections: number;
  framesSent: number;
}

/**
 * StreamBroadcastServer module
 */
export class StreamBroadcastServer {
  private source: ActiveStreamProvider;
  private minIntervalMs: number;
  private idlePollMs: number;

  private subscribers: Map<number, StreamSubscriber> = new Map();
  private loops: Map<number, Promise<void>> = new Map();
  private nextSubscriberId: number = 0;
  private framesSent: number = 0;

  constructor(config: StreamBroadcastServerConfig) {
    this.source = config.source;
    this.minIntervalMs = config.minIntervalMs ?? 66;
    this.idlePollMs = config.idlePollMs ?? 10;

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'StreamBroadcastServer' });
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
   * Express handler for GET /stream
   */
  handle = (req: Request, res: Response): void => {
    const active = this.source.getActiveStream();
    if (!active) {
      res.status(503).type('text/plain').send('No active capture session');
      return;
    }

    const id = ++this.nextSubscriberId;
    const link = linkedAbortController(active.signal);
    const { controller } = link;
    const untrack = active.trackViewer?.();
    const dispose = (): void => {
      link.dispose();
      untrack?.();
    };

    const subscriber: StreamSubscriber = {
      id,
      res,
      controller,
      connectedAt: Date.now(),
      lastSentAt: 0,
      lastSequence: 0,
      framesSent: 0,
    };

    res.writeHead(200, {
      'Content-Type': `multipart/x-mixed-replace; boundary=${MJPEG_BOUNDARY}`,
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      'Pragma': 'no-cache',
      'Expires': '0',
      'Connection': 'keep-alive',
    });
    res.flushHeaders();
    req.socket.setNoDelay(true);

    res.on('close', () => controller.abort());
    res.on('error', (error: Error) => {
      this.log('debug', `Stream connection ${id} error: ${error.message}`);
      controller.abort();
    });

    // Session stop closes the response right away instead of at the next tick
    controller.signal.addEventListener('abort', () => this.endResponse(res), { once: true });

    this.subscribers.set(id, subscriber);
    this.log('info', `Viewer ${id} connected from ${req.ip ?? 'unknown'} (${this.subscribers.size} watching)`);

    this.loops.set(id, this.runSubscriber(subscriber, active.store, dispose));
  };

  private async runSubscriber(subscriber: StreamSubscriber, store: FrameStore, dispose: () => void): Promise<void> {
    const { signal } = subscriber.controller;

    try {
      while (!signal.aborted) {
        const elapsed = Date.now() - subscriber.lastSentAt;
        if (elapsed < this.minIntervalMs) {
          await sleep(Math.min(this.minIntervalMs - elapsed, this.idlePollMs), signal);
          continue;
        }

        const frame = store.snapshot();
        // Unlike a plain per-tick resend, a frame this viewer already has is
        // not written again; the connection idles until a newer one arrives
        if (!frame || frame.sequence === subscriber.lastSequence) {
          await sleep(this.idlePollMs, signal);
          continue;
        }

        await this.writeFrame(subscriber, frame);
        subscriber.lastSentAt = Date.now();
        subscriber.lastSequence = frame.sequence;
        subscriber.framesSent++;
        this.framesSent++;
      }
    } catch (error) {
      const aborted = new ConnectionAbortedError(subscriber.id, { cause: error });
      this.log('debug', `${aborted.message}: ${describeError(error)}`);
    } finally {
      subscriber.controller.abort();
      dispose();
      this.endResponse(subscriber.res);
      this.subscribers.delete(subscriber.id);
      this.loops.delete(subscriber.id);

      const seconds = ((Date.now() - subscriber.connectedAt) / 1000).toFixed(1);
      this.log(
        'info',
        `Viewer ${subscriber.id} disconnected after ${subscriber.framesSent} frames in ${seconds}s (${this.subscribers.size} watching)`
      );
    }
  }

  /**
   * One multipart part: boundary, part header, blank line, JPEG bytes, CRLF
   */
  private async writeFrame(subscriber: StreamSubscriber, frame: Frame): Promise<void> {
    const { res } = subscriber;
    if (res.destroyed || res.writableEnded) {
      throw new Error('response already closed');
    }

    res.write(`--${MJPEG_BOUNDARY}\r\n`);
    res.write('Content-Type: image/jpeg\r\n\r\n');
    res.write(frame.data);
    const flushed = res.write('\r\n');

    if (!flushed) {
      await this.waitForDrain(res, subscriber.controller.signal);
    }
  }

  private waitForDrain(res: Response, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        res.off('drain', done);
        res.off('close', done);
        signal.removeEventListener('abort', done);
        resolve();
      };
      res.once('drain', done);
      res.once('close', done);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private endResponse(res: Response): void {
    if (!res.writableEnded && !res.destroyed) {
      res.end();
    }
  }

  /**
   * Disconnect every viewer and wait for their loops to finish
   */
  async closeAll(): Promise<void> {
    for (const subscriber of this.subscribers.values()) {
      subscriber.controller.abort();
    }
    await Promise.all(this.loops.values());
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  getStats(): BroadcastStats {
    return {
      subscribers: this.subscribers.size,
      totalConnections: this.nextSubscriberId,
      framesSent: this.framesSent,
    };
  }
}
