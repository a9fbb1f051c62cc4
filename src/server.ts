import http from 'http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { connectDB, disconnectDB } from './config/database.js';
import { SchedulingService } from './services/scheduling.service.js';
import { MemoryScheduleStore } from './stores/memoryScheduleStore.js';
import { MongoScheduleStore } from './stores/mongoScheduleStore.js';
import type { ScheduleStore } from './stores/scheduleStore.js';
import { logger } from './utils/logger.js';

let server: http.Server | undefined;

async function createStore(): Promise<ScheduleStore> {
  if (env.STORE_DRIVER === 'memory') {
    logger.warn('Using the in-memory schedule store; nothing survives a restart');
    return new MemoryScheduleStore();
  }
  await connectDB();
  return new MongoScheduleStore();
}

async function startServer(): Promise<void> {
  try {
    const store = await createStore();

    // Rebuild the engine from persisted slots, assignments and waitlists
    const service = await SchedulingService.create(store, {
      defaultWeights: {
        sibling_bonus: env.SCORING_SIBLING_BONUS,
        completeness_bonus: env.SCORING_COMPLETENESS_BONUS,
        distance_weight: env.SCORING_DISTANCE_WEIGHT,
        urgency_weight: env.SCORING_URGENCY_WEIGHT,
      },
      timeZone: env.TIMEZONE,
      demandThreshold: env.DEMAND_HIGHLIGHT_THRESHOLD,
    });

    server = http.createServer(createApp(service));
    server.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
      logger.info(`API prefix: ${env.API_PREFIX}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// ── Graceful Shutdown ──
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down gracefully...`);

  const closeDatabase = () => {
    disconnectDB()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error while closing MongoDB:', error);
        process.exit(1);
      });
  };

  if (server) {
    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');
      closeDatabase();
    });
  } else {
    closeDatabase();
  }

  // Force shutdown after 10s
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

void startServer();
