/**
 * Winston logger configuration
 */
import winston from 'winston';
import path from 'path';
import fs from 'fs-extra';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

/**
 * Logger options, usually taken from Config.logging plus the logs path
 */
export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  toFile: boolean;
  toConsole: boolean;
  logsPath: string;
  moduleFilter?: string[];
}

/**
 * Contexts allowed through the module filter (null = all)
 */
let allowedModules: Set<string> | null = null;

function isSerializedBuffer(value: unknown): value is { type: 'Buffer'; data: number[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  );
}

/**
 * JSON stringify that survives circular references, Buffers and errors
 */
function safeStringify(obj: unknown, indent: number = 2): string {
  const seen = new WeakSet<object>();

  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value === null || value === undefined) {
      return value;
    }

    if (value instanceof Error) {
      const errorObj: Record<string, unknown> = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
      if (value.cause) {
        errorObj.cause = value.cause;
      }
      return errorObj;
    }

    // Frame payloads would flood the log (Buffer#toJSON has already run here)
    if (isSerializedBuffer(value)) {
      return `<Buffer ${value.data.length} bytes>`;
    }

    if (typeof value === 'object') {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  }, indent);
}

const moduleFilter = winston.format((info) => {
  if (!allowedModules || allowedModules.size === 0) {
    return info;
  }

  if (typeof info.context === 'string' && !allowedModules.has(info.context)) {
    return false;
  }

  // Root logger has no context
  return info;
});

const consoleFormat = printf(({ level, message, timestamp, context, ...meta }) => {
  const contextStr = typeof context === 'string' ? `[${context}]` : '';
  const metaStr = Object.keys(meta).length ? safeStringify(meta, 2) : '';
  return `${String(timestamp)} [${level}]${contextStr}: ${String(message)} ${metaStr}`;
});

/**
 * Create logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    allowedModules = new Set(options.moduleFilter);
  } else {
    allowedModules = null;
  }

  if (options.toConsole) {
    transports.push(
      new winston.transports.Console({
        format: combine(
          moduleFilter(),
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          errors({ stack: true }),
          consoleFormat
        ),
      })
    );
  }

  if (options.toFile) {
    fs.ensureDirSync(options.logsPath);

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'error.log'),
        level: 'error',
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          json()
        ),
      })
    );

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'combined.log'),
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          options.format === 'json' ? json() : consoleFormat
        ),
      })
    );
  }

  return winston.createLogger({
    level: options.level,
    transports,
    // Keeps winston quiet when tests disable every transport
    silent: transports.length === 0,
    exitOnError: false,
  });
}

let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the default logger
 */
export function initLogger(options: LoggerOptions): void {
  loggerInstance = createLogger(options);

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    loggerInstance.info(`Log filtering enabled for modules: ${options.moduleFilter.join(', ')}`);
  } else {
    loggerInstance.debug('Log filtering disabled - showing all modules');
  }
}

/**
 * Get the logger instance
 * @throws Error if logger not initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return loggerInstance;
}

/**
 * Create a child logger with context
 */
export function createChildLogger(context: string): winston.Logger {
  return getLogger().child({ context });
}
