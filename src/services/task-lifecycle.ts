import { ITask, TaskStatus } from '@/types';
import { dayKey, daysBetween, dueTimeOn } from '@/utils/day-key';

export const TERMINAL_STATES: TaskStatus[] = [TaskStatus.COMPLETED, TaskStatus.FAILED, TaskStatus.EXPIRED];

export const TASK_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  [TaskStatus.PENDING]: [TaskStatus.IN_PROGRESS, TaskStatus.EXPIRED, TaskStatus.FAILED],
  [TaskStatus.IN_PROGRESS]: [TaskStatus.COMPLETED, TaskStatus.EXPIRED, TaskStatus.FAILED],
  [TaskStatus.COMPLETED]: [], // Terminal
  [TaskStatus.FAILED]: [], // Terminal
  [TaskStatus.EXPIRED]: [], // Terminal
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATES.includes(status);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

function assertTransition(task: ITask, to: TaskStatus): void {
  if (!canTransition(task.status, to)) {
    throw new Error('INVALID_TRANSITION');
  }
}

/**
 * Task state machine. Methods mutate the task they are given; callers pass a
 * working copy and persist it once the whole operation has succeeded.
 */
export class TaskLifecycle {
  static start(task: ITask, now: Date, minimumDurationSeconds?: number): ITask {
    assertTransition(task, TaskStatus.IN_PROGRESS);
    task.status = TaskStatus.IN_PROGRESS;
    if (!task.startedAt) {
      task.startedAt = now;
    }
    if (minimumDurationSeconds !== undefined) {
      task.minimumDurationSeconds = minimumDurationSeconds;
    }
    return task;
  }

  static complete(task: ITask, now: Date): ITask {
    assertTransition(task, TaskStatus.COMPLETED);
    task.status = TaskStatus.COMPLETED;
    task.completedAt = now;

    if (task.isHabit) {
      const today = dayKey(now);
      const previous = task.habitCompletedOn;
      task.habitStreak = previous !== undefined && daysBetween(previous, today) === 1 ? task.habitStreak + 1 : 1;
      task.habitLongestStreak = Math.max(task.habitLongestStreak, task.habitStreak);
      task.habitCompletedOn = today;
    }
    return task;
  }

  static expire(task: ITask): ITask {
    assertTransition(task, TaskStatus.EXPIRED);
    task.status = TaskStatus.EXPIRED;
    return task;
  }

  /**
   * Habit missed its due time. Only habits can fail.
   */
  static fail(task: ITask, now: Date): ITask {
    if (!task.isHabit) {
      throw new Error('INVALID_TRANSITION');
    }
    assertTransition(task, TaskStatus.FAILED);
    task.status = TaskStatus.FAILED;
    task.habitFailedOn = dayKey(now);
    task.habitStreak = 0;
    return task;
  }

  /**
   * Start a fresh daily instance of a recurring task. Completed and failed
   * habit days stay recorded in their day-keyed fields; the co-op award is
   * per instance and starts over.
   */
  static resetForNewDay(task: ITask): ITask {
    if (!task.isHabit && !task.isRecurring) {
      throw new Error('INVALID_TRANSITION');
    }
    task.status = TaskStatus.PENDING;
    task.startedAt = undefined;
    task.completedAt = undefined;
    task.proof = {};
    task.partnerConfirmed = false;
    task.coopBonusAwarded = false;
    return task;
  }

  static isCompletedToday(task: ITask, now: Date): boolean {
    return task.habitCompletedOn === dayKey(now);
  }

  static isFailedToday(task: ITask, now: Date): boolean {
    return task.habitFailedOn === dayKey(now);
  }

  /**
   * A habit that is still open today and whose local due time has passed.
   */
  static isHabitPastDue(task: ITask, now: Date): boolean {
    if (!task.isHabit || !task.habitDueTime || isTerminal(task.status)) {
      return false;
    }
    if (this.isCompletedToday(task, now) || this.isFailedToday(task, now)) {
      return false;
    }
    const due = dueTimeOn(now, task.habitDueTime);
    return due !== null && now.getTime() > due.getTime();
  }

  /**
   * A recurring task whose last terminal state belongs to an earlier day.
   */
  static needsDailyReset(task: ITask, now: Date): boolean {
    if ((!task.isHabit && !task.isRecurring) || !isTerminal(task.status) || task.status === TaskStatus.EXPIRED) {
      return false;
    }
    const today = dayKey(now);
    const lastDay =
      task.status === TaskStatus.FAILED
        ? task.habitFailedOn
        : task.completedAt
          ? dayKey(task.completedAt)
          : undefined;
    return lastDay !== undefined && lastDay !== today;
  }
}

export default TaskLifecycle;
