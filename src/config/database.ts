import mongoose from 'mongoose';
import { env } from './env';
import { logger } from './logger';

const connectDB = async (): Promise<void> => {
  try {
    await mongoose.connect(env.MONGODB_URI, { dbName: env.MONGODB_DB_NAME });
    logger.info('MongoDB connected successfully', { dbName: env.MONGODB_DB_NAME });
  } catch (error) {
    logger.error('MongoDB connection failed', { error });
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info('MongoDB connection closed');
};

export default connectDB;
