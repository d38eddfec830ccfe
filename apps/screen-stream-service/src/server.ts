/**
 * HTTP surface: viewer page, MJPEG stream and session control API
 */
import express, { Express, Request, Response, NextFunction } from 'express';
import { SessionFailure, SessionOverrides, SessionResult } from './types/index.js';
import { ConfigError, describeError } from './types/errors.js';
import { SessionManager } from './services/session-manager.service.js';
import { StreamBroadcastServer } from './modules/StreamBroadcastServer.js';
import { getLogger } from './utils/logger.js';

export interface AppOptions {
  sessionManager: SessionManager;
  broadcastServer: StreamBroadcastServer;
  /** Directory holding index.html */
  publicPath: string;
}

const OVERRIDE_FIELDS = ['frameRate', 'quality', 'scaleWidth', 'previewWidth'] as const;

const FAILURE_STATUS: Record<SessionFailure, number> = {
  'conflict': 409,
  'invalid': 400,
  'launch-failed': 500,
};

/**
 * Read session overrides from a request body
 * @throws ConfigError if a field is present but not a number
 */
export function parseSessionOverrides(body: unknown): SessionOverrides {
  const overrides: SessionOverrides = {};
  if (typeof body !== 'object' || body === null) {
    return overrides;
  }

  const problems: string[] = [];
  for (const field of OVERRIDE_FIELDS) {
    if (!(field in body)) {
      continue;
    }
    const value: unknown = Reflect.get(body, field);
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      problems.push(`${field} must be a number`);
      continue;
    }
    overrides[field] = value;
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return overrides;
}

function sendResult(res: Response, result: SessionResult): void {
  const status = result.success ? 200 : FAILURE_STATUS[result.failure ?? 'launch-failed'];
  res.status(status).json(result);
}

/**
 * Build the express application
 */
export function createApp(options: AppOptions): Express {
  const { sessionManager, broadcastServer, publicPath } = options;
  const logger = getLogger();
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.static(publicPath));

  /**
   * MJPEG stream
   */
  app.get('/stream', broadcastServer.handle);

  /**
   * Health check endpoint
   */
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  /**
   * Get session status
   */
  app.get('/api/session/status', (req: Request, res: Response) => {
    res.json(sessionManager.getStatus());
  });

  /**
   * Start capture session
   */
  app.post('/api/session/start', async (req: Request, res: Response) => {
    let overrides: SessionOverrides;
    try {
      overrides = parseSessionOverrides(req.body);
    } catch (error) {
      res.status(400).json({
        success: false,
        error: error instanceof ConfigError ? error.problems.join('; ') : describeError(error),
        status: sessionManager.getStatus(),
      });
      return;
    }

    try {
      logger.info('Starting capture session', overrides);
      const result = await sessionManager.startSession(overrides);
      sendResult(res, result);
    } catch (error) {
      logger.error('Failed to start capture session:', error);
      res.status(500).json({
        success: false,
        error: describeError(error),
      });
    }
  });

  /**
   * Stop capture session
   */
  app.post('/api/session/stop', async (req: Request, res: Response) => {
    try {
      logger.info('Stopping capture session');
      const result = await sessionManager.stopSession();
      sendResult(res, result);
    } catch (error) {
      logger.error('Failed to stop capture session:', error);
      res.status(500).json({
        success: false,
        error: describeError(error),
      });
    }
  });

  /**
   * Error handling middleware
   */
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error:', err);
    if (res.headersSent) {
      res.end();
      return;
    }
    // body-parser marks malformed JSON with a 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({
      success: false,
      error: err.message || 'Internal server error',
    });
  });

  return app;
}
