import http from 'http';
import mongoose from 'mongoose';
import app from './app.js';
import { env } from './config/env.js';
import { connectDB } from './config/database.js';
import { closeSocket, initializeSocket } from './modules/notifications/socket.service.js';
import { logger } from './utils/logger.js';

const server = http.createServer(app);

// ── Initialize Socket.io ──
initializeSocket(server);

async function startServer(): Promise<void> {
  try {
    await connectDB();

    server.listen(env.PORT, () => {
      logger.info(`${env.SHOP_NAME} server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
      logger.info(`API prefix: ${env.API_PREFIX}`);
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// ── Graceful Shutdown ──
async function closeConnections(): Promise<void> {
  await closeSocket();
  await mongoose.connection.close(false);
  logger.info('MongoDB connection closed');
}

function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down gracefully...`);

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');
    closeConnections()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  });

  // Force shutdown after 10s
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

void startServer();
