/**
 * Test frames.
 *
 * makeJpegFrame builds JPEG-shaped bytes (SOI, filler, EOI) for the scanner and
 * stream paths. Filler bytes never contain 0xFF, so the only EOI is the last
 * two bytes. encodeJpeg produces a real, decodable image for the preview path.
 */
import sharp from 'sharp';

export interface TestFrameOptions {
  /** Filler byte (default: 0x11) */
  fill?: number;
}

/**
 * Build a frame of exactly `length` bytes
 */
export function makeJpegFrame(length: number, options: TestFrameOptions = {}): Buffer {
  const fill = options.fill ?? 0x11;
  if (fill === 0xff) {
    throw new Error('fill byte must not be 0xFF');
  }

  const fillerLength = length - 4;
  if (fillerLength < 0) {
    throw new Error(`frame of ${length} bytes is too short`);
  }

  return Buffer.concat([
    Buffer.from([0xff, 0xd8]),
    Buffer.alloc(fillerLength, fill),
    Buffer.from([0xff, 0xd9]),
  ]);
}

export interface TestColour {
  r: number;
  g: number;
  b: number;
}

/** Colour encodeJpeg fills the image with by default */
export const TEST_COLOUR: TestColour = { r: 32, g: 96, b: 160 };

/**
 * Encode a solid-colour JPEG of the given size
 */
export function encodeJpeg(width: number, height: number, colour: TestColour = TEST_COLOUR): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: colour } })
    .jpeg({ quality: 90 })
    .toBuffer();
}
