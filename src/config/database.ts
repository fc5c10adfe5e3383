import mongoose from 'mongoose';
import { config, isProduction } from './index';
import { typedLogger } from '@/lib/typed-logger';
import { Bond, Character, Confirmation, RoutineBundle, Task } from '@/models';

// MongoDB connection options
const mongoOptions: mongoose.ConnectOptions = {
  maxPoolSize: isProduction ? 50 : 10,
  serverSelectionTimeoutMS: 5000,
  socketTimeoutMS: 45000,
  family: 4, // Use IPv4, skip trying IPv6
  retryWrites: true,
  retryReads: true,
  readPreference: 'primary',
  writeConcern: {
    w: 'majority',
    j: true,
    wtimeout: 5000,
  },
};

let isConnected = false;
let connectionPromise: Promise<typeof mongoose> | null = null;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Connect to MongoDB. Concurrent callers share one connection attempt.
 */
export const connectDB = async (): Promise<typeof mongoose> => {
  if (isConnected && mongoose.connection.readyState === 1) {
    return mongoose;
  }

  if (connectionPromise) {
    return connectionPromise;
  }

  connectionPromise = mongoose.connect(config.MONGODB_URI, mongoOptions);

  try {
    const connection = await connectionPromise;
    isConnected = true;

    typedLogger.info('MongoDB connected successfully', {
      host: connection.connection.host,
      port: connection.connection.port,
      database: connection.connection.name,
    });

    setupConnectionListeners();
    return connection;
  } catch (error) {
    isConnected = false;
    connectionPromise = null;
    typedLogger.error('MongoDB connection failed', { error: errorMessage(error) });
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  if (!isConnected) {
    return;
  }

  try {
    await mongoose.disconnect();
    isConnected = false;
    connectionPromise = null;
    typedLogger.info('MongoDB disconnected successfully');
  } catch (error) {
    typedLogger.error('Error disconnecting from MongoDB', { error: errorMessage(error) });
    throw error;
  }
};

const setupConnectionListeners = (): void => {
  const connection = mongoose.connection;

  connection.on('error', (error: unknown) => {
    typedLogger.error('MongoDB connection error', { error: errorMessage(error) });
    isConnected = false;
  });

  connection.on('disconnected', () => {
    typedLogger.warn('MongoDB disconnected');
    isConnected = false;
  });

  connection.on('reconnected', () => {
    typedLogger.info('MongoDB reconnected');
    isConnected = true;
  });
};

/**
 * Build the indexes declared on the game models.
 */
export const createIndexes = async (): Promise<void> => {
  try {
    await Promise.all([
      Task.syncIndexes(),
      Character.syncIndexes(),
      Bond.syncIndexes(),
      RoutineBundle.syncIndexes(),
      Confirmation.syncIndexes(),
    ]);
    typedLogger.info('Database indexes created successfully');
  } catch (error) {
    typedLogger.error('Error creating database indexes', { error: errorMessage(error) });
    throw error;
  }
};
