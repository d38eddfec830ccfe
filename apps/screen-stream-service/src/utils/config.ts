/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { CaptureSettings } from '../types/index.js';
import { ConfigError } from '../types/errors.js';

// npm runs workspace scripts from the app directory
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/**
 * Application configuration
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    publicPath: string;
  };
  capture: CaptureSettings & {
    autoStart: boolean;
  };
  scanner: {
    maxBufferBytes: number;
  };
  streaming: {
    minIntervalMs: number;
    idlePollMs: number;
  };
  shutdown: {
    timeoutMs: number;
  };
  preview: {
    enabled: boolean;
    width: number;
  };
  storage: {
    logsPath: string;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    moduleFilter?: string[];
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      port: parseInt(env.PORT || '5000', 10),
      host: env.HOST || '0.0.0.0',
      nodeEnv: env.NODE_ENV || 'development',
      publicPath: path.resolve(env.PUBLIC_PATH || './public'),
    },
    capture: {
      ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
      logLevel: env.FFMPEG_LOG_LEVEL || 'error',
      frameRate: parseInt(env.CAPTURE_FRAME_RATE || '15', 10),
      quality: parseInt(env.CAPTURE_QUALITY || '5', 10),
      scaleWidth: parseInt(env.CAPTURE_SCALE_WIDTH || '0', 10),
      input: env.CAPTURE_INPUT || '',
      autoStart: env.CAPTURE_AUTOSTART === 'true',
    },
    scanner: {
      maxBufferBytes: parseInt(env.SCANNER_MAX_BUFFER_BYTES || String(10 * 1024 * 1024), 10),
    },
    streaming: {
      minIntervalMs: parseInt(env.STREAM_MIN_INTERVAL_MS || '66', 10),
      idlePollMs: parseInt(env.STREAM_IDLE_POLL_MS || '10', 10),
    },
    shutdown: {
      timeoutMs: parseInt(env.SHUTDOWN_TIMEOUT_MS || '2000', 10),
    },
    preview: {
      enabled: env.PREVIEW_ENABLED === 'true',
      width: parseInt(env.PREVIEW_WIDTH || '800', 10),
    },
    storage: {
      logsPath: env.LOGS_PATH || './storage/logs',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      format: env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: env.LOG_TO_FILE === 'true',
      toConsole: env.LOG_TO_CONSOLE !== 'false',
      moduleFilter: env.LOG_MODULE_FILTER
        ? env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
  };
}

/**
 * Validate configuration
 * @throws ConfigError listing every problem found
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port <= 0 || config.server.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (!config.capture.ffmpegPath) {
    errors.push('FFMPEG_PATH is required');
  }

  if (!(config.capture.frameRate > 0)) {
    errors.push('CAPTURE_FRAME_RATE must be positive');
  }

  if (!(config.capture.quality >= 2 && config.capture.quality <= 31)) {
    errors.push('CAPTURE_QUALITY must be between 2 and 31');
  }

  if (!(config.capture.scaleWidth >= 0)) {
    errors.push('CAPTURE_SCALE_WIDTH must be 0 or a positive width');
  }

  if (!(config.scanner.maxBufferBytes > 0)) {
    errors.push('SCANNER_MAX_BUFFER_BYTES must be positive');
  }

  if (!(config.streaming.minIntervalMs >= 0)) {
    errors.push('STREAM_MIN_INTERVAL_MS must not be negative');
  }

  if (!(config.streaming.idlePollMs > 0)) {
    errors.push('STREAM_IDLE_POLL_MS must be positive');
  }

  if (!(config.shutdown.timeoutMs > 0)) {
    errors.push('SHUTDOWN_TIMEOUT_MS must be positive');
  }

  if (!(config.preview.width > 0)) {
    errors.push('PREVIEW_WIDTH must be positive');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  const config = loadConfig();
  validateConfig(config);
  return config;
}
