import { ICharacter } from '@/types';
import { daysBetween } from '@/utils/day-key';

/**
 * Daily activity streak. Consecutive local days with at least one completion
 * extend the streak; a gap of more than one day restarts it.
 */
export function recordActivity(character: ICharacter, today: string): void {
  const { streak } = character;
  const last = streak.lastActiveDay;

  if (last === undefined) {
    streak.current = 1;
  } else {
    const gap = daysBetween(last, today);
    if (gap === 0) {
      if (streak.current === 0) streak.current = 1;
    } else if (gap === 1) {
      streak.current += 1;
    } else if (gap > 1) {
      streak.current = 1;
    }
  }

  streak.longest = Math.max(streak.longest, streak.current);
  if (last === undefined || daysBetween(last, today) >= 0) {
    streak.lastActiveDay = today;
  }
}

/**
 * Zero the streak when the last active day is more than a day in the past.
 * Returns true when the streak was broken.
 */
export function expireStreakIfMissed(character: ICharacter, today: string): boolean {
  const last = character.streak.lastActiveDay;
  if (last === undefined || character.streak.current === 0) return false;
  if (daysBetween(last, today) > 1) {
    character.streak.current = 0;
    return true;
  }
  return false;
}
