import { LevelProgress } from '@/types';

/**
 * Level curve and level-based reward scaling. Pure functions.
 */

/**
 * Cumulative EXP needed to reach `level`: round(100 * (level - 1)^1.5).
 */
export function expThreshold(level: number): number {
  if (level <= 1) {
    return 0;
  }
  return Math.round(100 * Math.pow(level - 1, 1.5));
}

/**
 * +10% per level above 1, never below 1.
 */
export function levelScaleFactor(level: number): number {
  return Math.max(1, 1 + 0.1 * (level - 1));
}

export function scaledExp(baseExp: number, level: number): number {
  return Math.round(baseExp * levelScaleFactor(level));
}

export function scaledGold(baseGold: number, level: number): number {
  return Math.round(baseGold * levelScaleFactor(level));
}

export function canLevelUp(exp: number, level: number): boolean {
  return exp >= expThreshold(level + 1);
}

export function levelProgress(exp: number, level: number): LevelProgress {
  const floor = expThreshold(level);
  const required = expThreshold(level + 1) - floor;
  const current = exp - floor;
  const ratio = required > 0 ? Math.min(1, Math.max(0, current / required)) : 0;
  return { level, exp, current, required, ratio };
}
