import {
  IBond,
  ICharacter,
  IPendingConfirmation,
  IRoutineBundle,
  ITask,
  TaskStatus,
} from '@/types';

export interface TaskQuery {
  ownerId?: string;
  status?: TaskStatus | TaskStatus[];
  isHabit?: boolean;
  isRecurring?: boolean;
  isDailyDuty?: boolean;
  dutyDay?: string;
  coopPairId?: string;
  completedSince?: Date;
  dueBefore?: Date;
}

/**
 * One atomic write: everything in it is persisted, or nothing is.
 */
export interface UnitOfWork {
  tasks?: ITask[];
  characters?: ICharacter[];
  bonds?: IBond[];
  confirmations?: IPendingConfirmation[];
  routines?: IRoutineBundle[];
  deleteTaskIds?: string[];
}

/**
 * Persistence boundary for the quest engine. Reads return detached copies;
 * changes only take effect through `commit`.
 */
export interface GameStore {
  getTask(id: string): Promise<ITask | null>;
  findTasks(query: TaskQuery): Promise<ITask[]>;

  getCharacter(id: string): Promise<ICharacter | null>;

  getBond(id: string): Promise<IBond | null>;
  findBondByMember(characterId: string): Promise<IBond | null>;

  findRoutineBundles(ownerId: string): Promise<IRoutineBundle[]>;

  getConfirmation(token: string): Promise<IPendingConfirmation | null>;

  commit(unit: UnitOfWork): Promise<void>;
}

export function matchesTaskQuery(task: ITask, query: TaskQuery): boolean {
  if (query.ownerId !== undefined && task.ownerId !== query.ownerId) return false;
  if (query.status !== undefined) {
    const statuses = Array.isArray(query.status) ? query.status : [query.status];
    if (!statuses.includes(task.status)) return false;
  }
  if (query.isHabit !== undefined && task.isHabit !== query.isHabit) return false;
  if (query.isRecurring !== undefined && task.isRecurring !== query.isRecurring) return false;
  if (query.isDailyDuty !== undefined && task.isDailyDuty !== query.isDailyDuty) return false;
  if (query.dutyDay !== undefined && task.dutyDay !== query.dutyDay) return false;
  if (query.coopPairId !== undefined && task.coopPairId !== query.coopPairId) return false;
  if (query.completedSince !== undefined) {
    if (!task.completedAt || task.completedAt.getTime() < query.completedSince.getTime()) return false;
  }
  if (query.dueBefore !== undefined) {
    if (!task.dueDate || task.dueDate.getTime() >= query.dueBefore.getTime()) return false;
  }
  return true;
}
