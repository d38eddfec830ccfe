/**
 * Preview Pipeline Module
 * Optional decode path feeding the local display; one decode at a time,
 * frames arriving while a decode is in flight are skipped
 */
import sharp from 'sharp';
import { Frame, PreviewImage } from '../types/index.js';
import { PreviewDecodeError, describeError } from '../types/errors.js';
import { getLogger } from '../utils/logger.js';

let logger: ReturnType<typeof getLogger> | null = null;

/**
 * Turns frame bytes into something the display can show
 */
export interface FrameDecoder {
  decode(frame: Frame, targetWidth: number): Promise<PreviewImage>;
}

export type PreviewObserver = (image: PreviewImage) => void;

/**
 * PreviewPipeline configuration
 */
export interface PreviewPipelineConfig {
  /** Width the preview is fitted to */
  targetWidth: number;
  /** Receives each decoded preview */
  onPreview: PreviewObserver;
  /** Decoder (default: SharpFrameDecoder) */
  decoder?: FrameDecoder;
}

export interface PreviewStats {
  decoded: number;
  dropped: number;
  failed: number;
}

/**
 * Decodes the JPEG with sharp and scales it down to the target width.
 * Never scales up; the aspect ratio is kept.
 */
export class SharpFrameDecoder implements FrameDecoder {
  async decode(frame: Frame, targetWidth: number): Promise<PreviewImage> {
    try {
      const image = sharp(frame.data, { failOn: 'error' });
      const { width: sourceWidth, height: sourceHeight } = await image.metadata();
      if (!sourceWidth || !sourceHeight) {
        throw new PreviewDecodeError(frame.sequence, 'no image dimensions in header');
      }

      const { data, info } = await image
        .resize({ width: targetWidth, withoutEnlargement: true })
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      return {
        sequence: frame.sequence,
        width: info.width,
        height: info.height,
        channels: info.channels,
        sourceWidth,
        sourceHeight,
        data,
      };
    } catch (error) {
      if (error instanceof PreviewDecodeError) {
        throw error;
      }
      throw new PreviewDecodeError(frame.sequence, describeError(error), { cause: error });
    }
  }
}

/**
 * PreviewPipeline module
 */
export class PreviewPipeline {
  private targetWidth: number;
  private onPreview: PreviewObserver;
  private decoder: FrameDecoder;
  private inFlight: Promise<void> | null = null;
  private closed: boolean = false;
  private stats: PreviewStats = { decoded: 0, dropped: 0, failed: 0 };

  constructor(config: PreviewPipelineConfig) {
    this.targetWidth = config.targetWidth;
    this.onPreview = config.onPreview;
    this.decoder = config.decoder ?? new SharpFrameDecoder();

    // Lazy initialize logger
    if (!logger) {
      try {
        logger = getLogger().child({ context: 'PreviewPipeline' });
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
   * Offer a freshly published frame for preview
   * @returns false if the frame was skipped because a decode is in flight or the pipeline is closed
   */
  offer(frame: Frame): boolean {
    if (this.closed) {
      return false;
    }

    if (this.inFlight) {
      this.stats.dropped++;
      return false;
    }

    this.inFlight = this.decodeAndNotify(frame).finally(() => {
      this.inFlight = null;
    });
    return true;
  }

  private async decodeAndNotify(frame: Frame): Promise<void> {
    // Off the capture loop's turn
    await new Promise<void>((resolve) => setImmediate(resolve));

    try {
      const image = await this.decoder.decode(frame, this.targetWidth);
      if (this.closed) {
        return;
      }
      this.onPreview(image);
      this.stats.decoded++;
    } catch (error) {
      this.stats.failed++;
      this.log('warn', `Preview for frame ${frame.sequence} failed: ${describeError(error)}`);
    }
  }

  /**
   * Stop accepting frames; a decode still in flight is not delivered
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.inFlight;
  }

  /**
   * Resolves once no decode is in flight
   */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  isBusy(): boolean {
    return this.inFlight !== null;
  }

  getStats(): PreviewStats {
    return { ...this.stats };
  }
}
