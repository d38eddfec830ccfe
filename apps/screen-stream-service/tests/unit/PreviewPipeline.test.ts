/**
 * Unit tests for PreviewPipeline and the sharp decoder
 */
import { describe, it, expect, vi } from 'vitest';
import { SharpFrameDecoder, PreviewPipeline, FrameDecoder } from '../../src/modules/PreviewPipeline.js';
import { PreviewDecodeError } from '../../src/types/errors.js';
import { Frame, PreviewImage } from '../../src/types/index.js';
import { initLogger } from '../../src/utils/logger.js';
import { TEST_COLOUR, encodeJpeg, makeJpegFrame } from '../helpers/jpeg.js';

// Initialize logger for tests
initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

const toFrame = (sequence: number, data: Buffer): Frame => ({ sequence, data, capturedAt: Date.now() });

describe('SharpFrameDecoder', () => {
  const decoder = new SharpFrameDecoder();

  it('should decode wide frames to pixels at the target width', async () => {
    const data = await encodeJpeg(1920, 1080);

    const image = await decoder.decode(toFrame(7, data), 800);

    expect(image).toMatchObject({
      sequence: 7,
      width: 800,
      height: 450,
      channels: 3,
      sourceWidth: 1920,
      sourceHeight: 1080,
    });
    expect(image.data.length).toBe(800 * 450 * 3);
  });

  it('should keep the decoded colour', async () => {
    const data = await encodeJpeg(64, 48);

    const image = await decoder.decode(toFrame(1, data), 800);

    const [r, g, b] = image.data.subarray(0, 3);
    expect(Math.abs(r - TEST_COLOUR.r)).toBeLessThanOrEqual(4);
    expect(Math.abs(g - TEST_COLOUR.g)).toBeLessThanOrEqual(4);
    expect(Math.abs(b - TEST_COLOUR.b)).toBeLessThanOrEqual(4);
  });

  it('should not scale narrow frames up', async () => {
    const data = await encodeJpeg(640, 480);

    const image = await decoder.decode(toFrame(1, data), 800);

    expect(image.width).toBe(640);
    expect(image.height).toBe(480);
    expect(image.data.length).toBe(640 * 480 * 3);
  });

  it('should reject bytes that are not a decodable image', async () => {
    await expect(decoder.decode(toFrame(3, makeJpegFrame(50)), 800)).rejects.toBeInstanceOf(PreviewDecodeError);
  });
});

describe('PreviewPipeline', () => {
  const image = (sequence: number): PreviewImage => ({
    sequence,
    width: 8,
    height: 6,
    channels: 3,
    sourceWidth: 8,
    sourceHeight: 6,
    data: Buffer.alloc(0),
  });

  const frame = (sequence: number): Frame => toFrame(sequence, makeJpegFrame(16));

  it('should deliver the decoded preview to the observer', async () => {
    const onPreview = vi.fn();
    const decoder: FrameDecoder = { decode: async (f) => image(f.sequence) };
    const pipeline = new PreviewPipeline({ targetWidth: 800, onPreview, decoder });

    expect(pipeline.offer(frame(1))).toBe(true);
    await pipeline.idle();

    expect(onPreview).toHaveBeenCalledTimes(1);
    expect(onPreview).toHaveBeenCalledWith(image(1));
    expect(pipeline.getStats()).toEqual({ decoded: 1, dropped: 0, failed: 0 });
  });

  it('should skip frames while a decode is in flight', async () => {
    const onPreview = vi.fn();
    const decode = vi.fn(async (f: Frame) => image(f.sequence));
    const pipeline = new PreviewPipeline({ targetWidth: 800, onPreview, decoder: { decode } });

    expect(pipeline.offer(frame(1))).toBe(true);
    expect(pipeline.isBusy()).toBe(true);
    expect(pipeline.offer(frame(2))).toBe(false);
    expect(pipeline.offer(frame(3))).toBe(false);
    await pipeline.idle();

    expect(decode).toHaveBeenCalledTimes(1);
    expect(onPreview).toHaveBeenCalledWith(image(1));
    expect(pipeline.getStats()).toEqual({ decoded: 1, dropped: 2, failed: 0 });

    expect(pipeline.offer(frame(4))).toBe(true);
    await pipeline.idle();
    expect(pipeline.getStats().decoded).toBe(2);
  });

  it('should count decode failures without notifying the observer', async () => {
    const onPreview = vi.fn();
    const decoder: FrameDecoder = {
      decode: async (f) => {
        throw new PreviewDecodeError(f.sequence, 'corrupt');
      },
    };
    const pipeline = new PreviewPipeline({ targetWidth: 800, onPreview, decoder });

    pipeline.offer(frame(1));
    await pipeline.idle();

    expect(onPreview).not.toHaveBeenCalled();
    expect(pipeline.getStats()).toEqual({ decoded: 0, dropped: 0, failed: 1 });
    expect(pipeline.isBusy()).toBe(false);
  });

  it('should discard an in-flight result and refuse frames once closed', async () => {
    const onPreview = vi.fn();
    const decoder: FrameDecoder = { decode: async (f) => image(f.sequence) };
    const pipeline = new PreviewPipeline({ targetWidth: 800, onPreview, decoder });

    pipeline.offer(frame(1));
    await pipeline.close();

    expect(onPreview).not.toHaveBeenCalled();
    expect(pipeline.offer(frame(2))).toBe(false);
    expect(pipeline.getStats()).toEqual({ decoded: 0, dropped: 0, failed: 0 });
  });

  it('should use the sharp decoder by default', async () => {
    const onPreview = vi.fn();
    const pipeline = new PreviewPipeline({ targetWidth: 320, onPreview });

    pipeline.offer(toFrame(5, await encodeJpeg(640, 360)));
    await pipeline.idle();

    expect(onPreview).toHaveBeenCalledWith(expect.objectContaining({ sequence: 5, width: 320, height: 180, channels: 3 }));
  });
});
