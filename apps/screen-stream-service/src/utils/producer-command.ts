/**
 * Builds the ffmpeg screen-grab command for the current platform
 */
import { CaptureSettings, ProducerCommand } from '../types/index.js';
import { LaunchError } from '../types/errors.js';

interface GrabDevice {
  format: string;
  defaultInput: string;
}

const GRAB_DEVICES: Partial<Record<NodeJS.Platform, GrabDevice>> = {
  linux: { format: 'x11grab', defaultInput: ':0.0' },
  win32: { format: 'gdigrab', defaultInput: 'desktop' },
  darwin: { format: 'avfoundation', defaultInput: '1' },
};

/**
 * Build the producer command line.
 *
 * Output is a bare concatenation of JPEGs on stdout (`-f mjpeg -`), which is
 * what FrameBoundaryScanner expects. `q` on stdin makes ffmpeg quit cleanly.
 *
 * @throws LaunchError on platforms without a known screen-grab device
 */
export function buildProducerCommand(
  settings: CaptureSettings,
  platform: NodeJS.Platform = process.platform
): ProducerCommand {
  const device = GRAB_DEVICES[platform];
  if (!device) {
    throw new LaunchError(
      `Unsupported platform: ${platform}. Screen capture is available on linux, win32 and darwin.`,
      settings.ffmpegPath
    );
  }

  const filters = [`fps=${settings.frameRate}`];
  if (settings.scaleWidth > 0) {
    // -2 keeps the height even, which the mjpeg encoder requires for yuvj420p
    filters.push(`scale=${settings.scaleWidth}:-2`);
  }

  const args = [
    '-hide_banner',
    '-loglevel', settings.logLevel,
    '-f', device.format,
    '-framerate', String(settings.frameRate),
    '-i', settings.input || device.defaultInput,
    '-vf', filters.join(','),
    '-q:v', String(settings.quality),
    '-f', 'mjpeg',
    '-',
  ];

  return { command: settings.ffmpegPath, args };
}

/**
 * Render a producer command for logs
 */
export function formatCommand(producer: ProducerCommand): string {
  return [producer.command, ...producer.args].join(' ');
}
