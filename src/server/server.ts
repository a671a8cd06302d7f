import { loadEnvironment } from '../config/environment.js';
import { createLogger } from '../utils/logger.js';
import { createApp } from './app.js';
import { registerRoutes } from '../routes/index.js';
import { OpenMeteoArchiveAdapter } from '../adapters/open-meteo/open-meteo-archive.adapter.js';
import { initializeStorage } from '../services/storage/object-store.gateway.js';
import { createBlobStore } from '../services/storage/storage.factory.js';

async function start(): Promise<void> {
  try {
    // Load and validate environment variables
    const env = loadEnvironment();

    // Initialize logger
    const logger = createLogger(env);

    logger.info('🚀 Starting weather archive service...');
    logger.info(`Environment: ${env.NODE_ENV}`);

    // Storage failures leave the service up with storage endpoints answering 500
    const storage = await initializeStorage(() => createBlobStore(env, logger), logger);
    if (storage.state === 'ready') {
      logger.info(`✅ Object storage ready at ${storage.gateway.location}`);
    } else {
      logger.warn(`⚠️ Object storage unavailable: ${storage.reason}`);
    }

    const weatherClient = new OpenMeteoArchiveAdapter(
      {
        archiveUrl: env.OPEN_METEO_ARCHIVE_URL,
        timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      },
      logger,
    );

    // Create Fastify app
    const app = await createApp(env, logger);

    // Register all routes
    await registerRoutes(app, {
      storage,
      weatherClient,
      clock: () => new Date(),
    });
    logger.info('✅ Routes registered');

    // Start server
    await app.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logger.info(`✅ Server listening on http://${env.HOST}:${env.PORT}`);
    logger.info(`📚 API Documentation: http://${env.HOST}:${env.PORT}/documentation`);

    // Graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`${signal} received, shutting down gracefully...`);
      await app.close();
      logger.info('Server closed');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void start();
