import mongoose from 'mongoose';
import { env } from './env.js';
import { logger } from '../utils/logger.js';

mongoose.set('strictQuery', true);

/**
 * Open the shared connection. Errors propagate so the caller decides how to exit.
 */
export async function connectDB(): Promise<typeof mongoose> {
  mongoose.connection.on('error', (err) => {
    logger.error({ err }, 'MongoDB runtime error');
  });
  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  const conn = await mongoose.connect(env.MONGODB_URI, { serverSelectionTimeoutMS: 10_000 });
  logger.info(`MongoDB connected: ${conn.connection.host}/${conn.connection.name}`);
  return conn;
}
