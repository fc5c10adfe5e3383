import { QUEST_CONSTANTS } from '@/config';
import { IRoutineBundle, ITask } from '@/types';
import { dayKey } from '@/utils/day-key';

export interface RoutineBundleCheck {
  completed: boolean;
  bundle?: IRoutineBundle;
  bonusExp: number;
}

export function isValidRoutineSize(habitIds: readonly string[]): boolean {
  const unique = new Set(habitIds);
  return (
    unique.size === habitIds.length &&
    habitIds.length >= QUEST_CONSTANTS.ROUTINE_MIN_HABITS &&
    habitIds.length <= QUEST_CONSTANTS.ROUTINE_MAX_HABITS
  );
}

/**
 * Completing `habit` finishes a bundle when every other habit in an active
 * bundle containing it was already completed today. The bonus is half the
 * scaled base, once per habit in the bundle.
 */
export function checkRoutineBundleCompletion(
  habit: ITask,
  bundles: readonly IRoutineBundle[],
  habits: readonly ITask[],
  scaledBaseExp: number,
  now: Date
): RoutineBundleCheck {
  if (!habit.isHabit) {
    return { completed: false, bonusExp: 0 };
  }
  const today = dayKey(now);

  for (const bundle of bundles) {
    if (bundle.isArchived || !bundle.habitIds.includes(habit.id)) continue;

    const othersDone = bundle.habitIds
      .filter((id) => id !== habit.id)
      .every((id) => habits.some((h) => h.id === id && h.habitCompletedOn === today));

    if (othersDone) {
      const bonusExp = Math.round(scaledBaseExp * QUEST_CONSTANTS.ROUTINE_BUNDLE_BONUS) * bundle.habitIds.length;
      return { completed: true, bundle, bonusExp };
    }
  }
  return { completed: false, bonusExp: 0 };
}
