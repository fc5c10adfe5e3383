import { config } from '@/config';
import { typedLogger } from '@/lib/typed-logger';
import { QuestEngine } from '@/modules/quests/quests.service';

export interface ScheduledJobs {
  stop(): void;
}

type Job = {
  name: string;
  run: () => Promise<unknown>;
};

/**
 * Run one maintenance pass. A failing job is logged and the others still run.
 */
export async function runMaintenance(engine: QuestEngine): Promise<void> {
  const jobs: Job[] = [
    { name: 'habit deadlines', run: () => engine.checkHabitDeadlines() },
    { name: 'recurring reset', run: () => engine.resetRecurringHabits() },
    { name: 'expired sweep', run: () => engine.sweepExpiredTasks() },
  ];

  for (const job of jobs) {
    try {
      await job.run();
    } catch (error) {
      typedLogger.error('Scheduled job error', {
        job: job.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export function startScheduledJobs(engine: QuestEngine, intervalMs: number = config.SWEEP_INTERVAL_MS): ScheduledJobs {
  let running = false;

  const timer = setInterval(() => {
    // Skip a tick while the previous pass is still running
    if (running) return;
    running = true;
    runMaintenance(engine)
      .catch((error: unknown) => {
        typedLogger.error('Maintenance pass failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);

  typedLogger.info('Scheduled jobs started', { intervalMs });

  return {
    stop() {
      clearInterval(timer);
      typedLogger.info('Scheduled jobs stopped');
    },
  };
}
