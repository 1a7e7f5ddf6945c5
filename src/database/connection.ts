import mongoose from 'mongoose';
import { logger } from '@/utils/logger';

interface DatabaseConfig {
  uri: string;
  options?: mongoose.ConnectOptions;
}

export const connectDB = async (config: DatabaseConfig): Promise<typeof mongoose> => {
  try {
    await mongoose.connect(config.uri, config.options);
    return mongoose;
  } catch (error) {
    logger.error('MongoDB connection error:', error);
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

mongoose.connection.on('connected', () => {
  logger.info('MongoDB connected');
});

mongoose.connection.on('error', (err) => {
  logger.error('MongoDB connection error:', err);
});

mongoose.connection.on('disconnected', () => {
  logger.info('MongoDB disconnected');
});
