import { v4 as uuidv4 } from 'uuid';
import {
  CompletionMode,
  Geofence,
  ITask,
  MiniGameKind,
  TaskCategory,
  TaskStatus,
  VerificationType,
} from '@/types';

export interface NewTaskInput {
  ownerId: string;
  title: string;
  description?: string;
  category: TaskCategory;
  verificationType?: VerificationType;
  completionMode?: CompletionMode;
  miniGameKind?: MiniGameKind;
  dueDate?: Date;
  minimumDurationSeconds?: number;
  geofence?: Geofence;
  customExp?: number;
  customGold?: number;
  isHabit?: boolean;
  habitDueTime?: string;
  isRecurring?: boolean;
  isFromPartner?: boolean;
  isSharedWithPartner?: boolean;
  isCoop?: boolean;
  coopPairId?: string;
  isOnDutyBoard?: boolean;
  isDailyDuty?: boolean;
  dutyDay?: string;
  isBonusDuty?: boolean;
}

/**
 * The completion mode is fixed when the task is created.
 */
export function resolveCompletionMode(input: Pick<NewTaskInput, 'completionMode' | 'isHabit' | 'miniGameKind'>): CompletionMode {
  if (input.completionMode) return input.completionMode;
  if (input.isHabit) return CompletionMode.HABIT;
  if (input.miniGameKind) return CompletionMode.MINI_GAME;
  return CompletionMode.STANDARD;
}

export function buildTask(input: NewTaskInput, now: Date): ITask {
  return {
    id: uuidv4(),
    ownerId: input.ownerId,
    title: input.title,
    description: input.description ?? '',
    category: input.category,
    verificationType: input.verificationType ?? VerificationType.NONE,
    status: TaskStatus.PENDING,
    completionMode: resolveCompletionMode(input),
    miniGameKind: input.miniGameKind,
    createdAt: now,
    dueDate: input.dueDate,
    minimumDurationSeconds: input.minimumDurationSeconds,
    geofence: input.geofence,
    proof: {},
    customExp: input.customExp,
    customGold: input.customGold,
    isOnDutyBoard: input.isOnDutyBoard ?? false,
    isDailyDuty: input.isDailyDuty ?? false,
    isHabit: input.isHabit ?? false,
    isRecurring: input.isRecurring ?? input.isHabit ?? false,
    isFromPartner: input.isFromPartner ?? false,
    isSharedWithPartner: input.isSharedWithPartner ?? false,
    isCoop: input.isCoop ?? false,
    dutyDay: input.dutyDay,
    isBonusDuty: input.isBonusDuty,
    habitDueTime: input.habitDueTime,
    habitStreak: 0,
    habitLongestStreak: 0,
    coopPairId: input.coopPairId,
    coopBonusAwarded: false,
    partnerConfirmed: false,
  };
}
