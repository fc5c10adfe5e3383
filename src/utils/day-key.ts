import { DateTime } from 'luxon';
import { config } from '@/config';

/**
 * Calendar-day helpers. All day boundaries are local midnight in the
 * configured timezone; day keys are ISO dates (`yyyy-MM-dd`).
 */

export function dayKey(date: Date, zone: string = config.DEFAULT_TIMEZONE): string {
  return DateTime.fromJSDate(date).setZone(zone).toFormat('yyyy-MM-dd');
}

/**
 * Whole calendar days from `fromKey` to `toKey` (negative when `toKey` is earlier).
 */
export function daysBetween(fromKey: string, toKey: string): number {
  const from = DateTime.fromISO(fromKey, { zone: 'UTC' });
  const to = DateTime.fromISO(toKey, { zone: 'UTC' });
  return Math.round(to.diff(from, 'days').days);
}

export function localHour(date: Date, zone: string = config.DEFAULT_TIMEZONE): number {
  return DateTime.fromJSDate(date).setZone(zone).hour;
}

/**
 * Instant at which a `HH:mm` due time falls on the local day containing `date`.
 * Returns null for malformed times.
 */
export function dueTimeOn(date: Date, dueTime: string, zone: string = config.DEFAULT_TIMEZONE): Date | null {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(dueTime);
  if (!match) {
    return null;
  }
  return DateTime.fromJSDate(date)
    .setZone(zone)
    .set({ hour: Number(match[1]), minute: Number(match[2]), second: 0, millisecond: 0 })
    .toJSDate();
}
