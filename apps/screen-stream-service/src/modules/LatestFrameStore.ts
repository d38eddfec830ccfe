/**
 * Latest Frame Store
 * Single-slot, overwrite-on-publish hand-off between the capture loop and viewers
 */
import { Frame } from '../types/index.js';

/**
 * One writer, many readers. Readers get the newest frame or nothing;
 * frames published between two reads are never seen by that reader.
 */
export interface FrameStore {
  /** Replace the current frame. Never blocks. */
  publish(frame: Frame): void;
  /** Current frame, or null before the first publish */
  snapshot(): Frame | null;
  /** Empty the slot */
  clear(): void;
}

/**
 * FrameStore backed by a single reference.
 *
 * Publishing is one assignment on the event loop thread, so a reader can
 * only ever see a whole frame. Frames are frozen and readers keep their own
 * reference, which stays valid after the slot moves on.
 */
export class LatestFrameStore implements FrameStore {
  private slot: Frame | null = null;
  private publishCount: number = 0;

  publish(frame: Frame): void {
    this.slot = frame;
    this.publishCount++;
  }

  snapshot(): Frame | null {
    return this.slot;
  }

  clear(): void {
    this.slot = null;
  }

  hasFrame(): boolean {
    return this.slot !== null;
  }

  getPublishCount(): number {
    return this.publishCount;
  }
}
