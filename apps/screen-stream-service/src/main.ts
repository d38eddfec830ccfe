/**
 * Screen Stream Service - Main Entry Point
 * Serves the desktop as an MJPEG stream with a REST API for session control
 */
import { getConfig, Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { describeError } from './types/errors.js';
import { SessionManager } from './services/session-manager.service.js';
import { StreamBroadcastServer } from './modules/StreamBroadcastServer.js';
import { createApp } from './server.js';

// Load configuration
const config: Config = getConfig();

// Initialize logger
initLogger({
  ...config.logging,
  logsPath: config.storage.logsPath,
});
const logger = getLogger();

const sessionManager = new SessionManager({ config });

const broadcastServer = new StreamBroadcastServer({
  source: sessionManager,
  minIntervalMs: config.streaming.minIntervalMs,
  idlePollMs: config.streaming.idlePollMs,
});

sessionManager.on('status:update', (status) => {
  logger.debug(`Session status: ${status.state}`);
});

sessionManager.on('error', (error) => {
  logger.error('Session error:', error);
});

// No desktop window here; previews only show up in the debug log
sessionManager.on('preview', (image) => {
  logger.debug(
    `Preview frame ${image.sequence}: ${image.width}x${image.height} (source ${image.sourceWidth}x${image.sourceHeight})`
  );
});

const app = createApp({
  sessionManager,
  broadcastServer,
  publicPath: config.server.publicPath,
});

/**
 * Start server
 */
const { port, host } = config.server;
const server = app.listen(port, host, () => {
  logger.info('🚀 Screen Stream Service started');
  logger.info(`📡 Server running on http://${host}:${port}`);
  logger.info(`🎥 Stream at http://${host}:${port}/stream`);
  logger.info(`📊 API available at http://${host}:${port}/api`);

  if (config.capture.autoStart) {
    sessionManager
      .startSession()
      .then((result) => {
        if (!result.success) {
          logger.error(`Auto-start failed: ${result.error}`);
        }
      })
      .catch((error: unknown) => {
        logger.error(`Auto-start failed: ${describeError(error)}`);
      });
  }
});

/**
 * Graceful shutdown
 */
let shuttingDown = false;

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down gracefully...`);

  try {
    if (sessionManager.isStreaming()) {
      await sessionManager.stopSession();
    }
    await broadcastServer.closeAll();
  } catch (error) {
    logger.error('Error stopping capture during shutdown:', error);
  }

  server.close((error) => {
    if (error) {
      logger.error('Error closing HTTP server:', error);
    }
    process.exit(0);
  });
};

const onSignal = (signal: NodeJS.Signals): void => {
  shutdown(signal).catch((error: unknown) => {
    logger.error(`Shutdown failed: ${describeError(error)}`);
    process.exit(1);
  });
};

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);
