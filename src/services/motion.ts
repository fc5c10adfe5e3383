import { QUEST_CONSTANTS } from '@/config';

export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
}

/**
 * Motion is an advisory signal captured around the photo: it can raise the
 * reward, never block it. Detected when the population variance of the last
 * window-size samples is above the threshold; fewer than three samples is
 * "no motion", never an error.
 */
export function detectMotion(samples: readonly number[]): boolean {
  const window = samples.filter(Number.isFinite).slice(-QUEST_CONSTANTS.MOTION_WINDOW_SIZE);
  if (window.length < QUEST_CONSTANTS.MOTION_MIN_SAMPLES) {
    return false;
  }
  return variance(window) > QUEST_CONSTANTS.MOTION_VARIANCE_THRESHOLD;
}
