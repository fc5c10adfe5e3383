import { describe, it, expect, jest } from '@jest/globals';
import { runMaintenance, startScheduledJobs } from '../../src/jobs';
import { TaskCategory, TaskStatus } from '../../src/types';
import { createTestEngine } from '../helpers';

describe('Scheduled jobs', () => {
  it('should fail overdue habits and expire overdue tasks in one pass', async () => {
    const { engine, clock } = createTestEngine();
    const heroId = (await engine.createCharacter({ name: 'Hero' })).id;
    const habit = await engine.createTask({
      ownerId: heroId,
      title: 'Stretch',
      category: TaskCategory.WELLNESS,
      isHabit: true,
      habitDueTime: '11:00',
    });
    const errand = await engine.createTask({
      ownerId: heroId,
      title: 'Post a letter',
      category: TaskCategory.HOUSEHOLD,
      dueDate: new Date(clock.now().getTime() + 1000),
    });
    clock.advanceSeconds(5);

    await runMaintenance(engine);

    expect((await engine.getTask(habit.id)).status).toBe(TaskStatus.FAILED);
    expect((await engine.getTask(errand.id)).status).toBe(TaskStatus.EXPIRED);
  });

  it('should keep running the other jobs when one fails', async () => {
    const { engine } = createTestEngine();
    const failing = jest.spyOn(engine, 'checkHabitDeadlines').mockRejectedValue(new Error('STORE_UNAVAILABLE'));
    const sweep = jest.spyOn(engine, 'sweepExpiredTasks');

    await runMaintenance(engine);

    expect(failing).toHaveBeenCalledTimes(1);
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it('should stop the interval', () => {
    const { engine } = createTestEngine();
    const jobs = startScheduledJobs(engine, 60000);
    expect(() => jobs.stop()).not.toThrow();
  });
});
