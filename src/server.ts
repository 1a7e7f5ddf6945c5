import dotenv from 'dotenv';
import { loadConfig } from '@/config';
import { createApp } from './app';
import { createAuthContext } from '@/core/context';
import { connectDB, disconnectDB } from '@/database/connection';
import { connectRedis, disconnectRedis } from '@/database/redis.connection';
import { createMongoUserRepository } from '@/database/user.repository';
import { logger } from '@/utils/logger';

dotenv.config();

async function startServer(): Promise<void> {
  const config = loadConfig();

  await connectDB({ uri: config.MONGODB_URI });
  const redis = connectRedis(config.REDIS_URL);

  const context = createAuthContext({
    config,
    redis,
    userRepository: createMongoUserRepository(),
  });
  logger.info(`✓ Signing with ${config.JWT.ALGORITHM} key ${config.JWT.KEY_ID}, refresh policy ${config.REFRESH_TOKEN_POLICY}`);

  const app = createApp(context);
  const server = app.listen(config.PORT, () => {
    logger.info(`✓ Server running on port ${config.PORT}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      Promise.all([disconnectRedis(redis), disconnectDB()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
