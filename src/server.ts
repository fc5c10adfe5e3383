import { FastifyInstance } from 'fastify';
import { config } from '@/config';
import { logError } from '@/lib/logger';
import { typedLogger } from '@/lib/typed-logger';
import { connectDB, createIndexes, disconnectDB } from '@/config/database';
import { MongoGameStore } from '@/repositories/mongo-store';
import { QuestEngine } from '@/modules/quests';
import { ScheduledJobs, startScheduledJobs } from '@/jobs';
import { createApp } from './app';

/**
 * Graceful shutdown: stop the jobs, finish in-flight confirmations, close
 * the HTTP server, then the database.
 */
async function gracefulShutdown(
  server: FastifyInstance,
  engine: QuestEngine,
  jobs: ScheduledJobs,
  signal: string
): Promise<void> {
  typedLogger.info('Shutting down gracefully', { signal });

  try {
    jobs.stop();
    await server.close();
    await engine.drain();
    await disconnectDB();
    typedLogger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    typedLogger.error('Error during graceful shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

async function start(): Promise<void> {
  typedLogger.info('Starting quest engine', { environment: config.NODE_ENV, port: config.PORT });

  await connectDB();
  await createIndexes();

  const engine = new QuestEngine({ store: new MongoGameStore() });
  const server = await createApp({ engine });
  const jobs = startScheduledJobs(engine);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      gracefulShutdown(server, engine, jobs, signal).catch((error: unknown) => {
        typedLogger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
    });
  }

  await server.listen({ port: config.PORT, host: config.HOST });
  typedLogger.info('Server listening', { host: config.HOST, port: config.PORT });
}

process.on('unhandledRejection', (reason: unknown) => {
  typedLogger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
});

start().catch((error: unknown) => {
  if (error instanceof Error) {
    logError(error, { phase: 'startup' });
  } else {
    typedLogger.error('Failed to start server', { error: String(error) });
  }
  process.exit(1);
});
