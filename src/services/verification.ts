import { QUEST_CONSTANTS, VERIFICATION_CONSTANTS } from '@/config';
import {
  AnomalyFlag,
  AnomalyType,
  CompletionCheck,
  GeofenceResult,
  ITask,
  TaskCategory,
  VerificationTier,
  VerificationType,
} from '@/types';
import { calculateGeodesicDistance, formatDistance } from '@/utils/geo';
import { localHour } from '@/utils/day-key';

export interface TierAssessment {
  tier: VerificationTier;
  multiplier: number;
  lootChanceBonus: number;
  geofence?: GeofenceResult;
}

const TIER_MULTIPLIERS: Record<VerificationTier, number> = {
  [VerificationTier.NONE]: 1.0,
  [VerificationTier.PHOTO]: 1.5,
  [VerificationTier.LOCATION]: 1.5,
  [VerificationTier.BOTH]: 2.0,
};

const TIER_LOOT_BONUS: Record<VerificationTier, number> = {
  [VerificationTier.NONE]: 0,
  [VerificationTier.PHOTO]: 0.05,
  [VerificationTier.LOCATION]: 0.05,
  [VerificationTier.BOTH]: 0.08,
};

const OUT_OF_RANGE_LOOT_BONUS = 0.02;

// Location-only minimum durations, by category (seconds)
const LOCATION_MIN_DURATION: Record<TaskCategory, number> = {
  [TaskCategory.PHYSICAL]: 300,
  [TaskCategory.MENTAL]: 120,
  [TaskCategory.CREATIVE]: 120,
  [TaskCategory.SOCIAL]: 60,
  [TaskCategory.HOUSEHOLD]: 60,
  [TaskCategory.WELLNESS]: 60,
};

const PHOTO_MIN_DURATION = 60;

export function requiresPhoto(type: VerificationType): boolean {
  return type === VerificationType.PHOTO || type === VerificationType.BOTH;
}

export function requiresLocation(type: VerificationType): boolean {
  return type === VerificationType.LOCATION || type === VerificationType.BOTH;
}

function formatWait(remaining: number): string {
  const mins = Math.floor(remaining / 60);
  const secs = remaining % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}

/**
 * Stateless anti-cheat validators. Nothing here throws: every check returns
 * a value the caller uses to block completion or lower the reward tier.
 */
export class VerificationEngine {
  /**
   * Valid while 0 <= now - capturedAt <= 5 minutes (inclusive), with a small
   * tolerance for capture timestamps slightly ahead of the server clock.
   */
  static isPhotoTimestampValid(capturedAt: Date, now: Date = new Date()): boolean {
    const age = now.getTime() - capturedAt.getTime();
    if (Number.isNaN(age)) return false;
    return age >= -VERIFICATION_CONSTANTS.PHOTO_CLOCK_SKEW_MS && age <= VERIFICATION_CONSTANTS.PHOTO_MAX_AGE_MS;
  }

  static verifyGeofence(
    targetLat: number,
    targetLng: number,
    targetRadius: number,
    userLat: number,
    userLng: number
  ): GeofenceResult {
    const distance = calculateGeodesicDistance(
      { lat: targetLat, lng: targetLng },
      { lat: userLat, lng: userLng }
    );
    return {
      inRange: distance <= targetRadius,
      distance,
      radius: targetRadius,
      distanceText: formatDistance(distance),
    };
  }

  /**
   * Geofence check against the task's own target. Tasks without a geofence
   * (or without a captured location) count as in range.
   */
  static verifyTaskGeofence(task: ITask): GeofenceResult {
    const { geofence } = task;
    const location = task.proof.location;
    if (!geofence || !location) {
      return { inRange: true, distance: 0, radius: geofence?.radius ?? 0, distanceText: formatDistance(0) };
    }
    return this.verifyGeofence(geofence.lat, geofence.lng, geofence.radius, location.lat, location.lng);
  }

  static policyMinimumSeconds(task: ITask): number {
    if (task.verificationType === VerificationType.NONE) {
      return 0;
    }
    if (requiresPhoto(task.verificationType)) {
      return PHOTO_MIN_DURATION;
    }
    return LOCATION_MIN_DURATION[task.category];
  }

  /**
   * An explicit minimum can lengthen the wait but never shorten the
   * verification policy's.
   */
  static minimumDurationSeconds(task: ITask): number {
    return Math.max(task.minimumDurationSeconds ?? 0, this.policyMinimumSeconds(task));
  }

  /**
   * Completion gate, evaluated in order: minimum duration, proof, deadline.
   * The first failing check determines the reason.
   */
  static canComplete(task: ITask, now: Date = new Date()): CompletionCheck {
    if (task.startedAt) {
      const elapsed = (now.getTime() - task.startedAt.getTime()) / 1000;
      const remaining = Math.ceil(Math.max(0, this.minimumDurationSeconds(task) - elapsed));
      if (remaining > 0) {
        return {
          allowed: false,
          code: 'MIN_DURATION_NOT_MET',
          reason: `Please wait ${formatWait(remaining)} before completing this task.`,
          remainingSeconds: remaining,
        };
      }
    }

    if (requiresPhoto(task.verificationType)) {
      const photo = task.proof.photo;
      if (!photo) {
        return { allowed: false, code: 'PHOTO_REQUIRED', reason: 'Take a photo to verify this task.', remainingSeconds: 0 };
      }
      if (!this.isPhotoTimestampValid(photo.capturedAt, now)) {
        return {
          allowed: false,
          code: 'PHOTO_EXPIRED',
          reason: 'Photo expired. Please take a new photo.',
          remainingSeconds: 0,
        };
      }
    }

    if (requiresLocation(task.verificationType) && !task.proof.location) {
      return {
        allowed: false,
        code: 'LOCATION_REQUIRED',
        reason: 'Capture your location to verify this task.',
        remainingSeconds: 0,
      };
    }

    if (task.dueDate && task.dueDate.getTime() < now.getTime()) {
      return { allowed: false, code: 'DEADLINE_PASSED', reason: 'This task is past its deadline.', remainingSeconds: 0 };
    }

    return { allowed: true, remainingSeconds: 0 };
  }

  /**
   * Tier actually achieved by the captured proof, and the EXP multiplier and
   * loot bonus it earns. Location outside the geofence earns half the extra credit.
   */
  static assessTier(task: ITask, now: Date = new Date()): TierAssessment {
    const photo = task.proof.photo;
    const hasPhoto =
      requiresPhoto(task.verificationType) && photo !== undefined && this.isPhotoTimestampValid(photo.capturedAt, now);
    const hasLocation = requiresLocation(task.verificationType) && task.proof.location !== undefined;

    let tier = VerificationTier.NONE;
    if (hasPhoto && hasLocation) tier = VerificationTier.BOTH;
    else if (hasPhoto) tier = VerificationTier.PHOTO;
    else if (hasLocation) tier = VerificationTier.LOCATION;

    let multiplier = TIER_MULTIPLIERS[tier];
    let lootChanceBonus = TIER_LOOT_BONUS[tier];
    let geofence: GeofenceResult | undefined;

    if (hasLocation) {
      geofence = this.verifyTaskGeofence(task);
      if (!geofence.inRange) {
        multiplier = 1 + (multiplier - 1) * QUEST_CONSTANTS.OUT_OF_RANGE_CREDIT;
        lootChanceBonus = tier === VerificationTier.BOTH ? TIER_LOOT_BONUS[VerificationTier.PHOTO] : OUT_OF_RANGE_LOOT_BONUS;
      }
    }

    if (hasPhoto && photo?.motionDetected) {
      multiplier += QUEST_CONSTANTS.MOTION_MULTIPLIER_BONUS;
    }

    return { tier, multiplier, lootChanceBonus, geofence };
  }

  /**
   * Scan recent completion times for suspicious patterns. Advisory only.
   */
  static detectAnomalies(recentCompletions: readonly Date[], now: Date = new Date()): AnomalyFlag[] {
    const flags: AnomalyFlag[] = [];
    const nowMs = now.getTime();
    const lastDay = recentCompletions.filter((d) => nowMs - d.getTime() < 24 * 60 * 60 * 1000);
    const rapid = lastDay.filter((d) => nowMs - d.getTime() < QUEST_CONSTANTS.ANOMALY_RAPID_WINDOW_MS);

    if (rapid.length > QUEST_CONSTANTS.ANOMALY_RAPID_COUNT) {
      flags.push({ type: AnomalyType.RAPID_COMPLETION, description: `${rapid.length} tasks in 10 minutes` });
    }

    const hour = localHour(now);
    if (hour >= QUEST_CONSTANTS.ANOMALY_LATE_NIGHT_START && hour < QUEST_CONSTANTS.ANOMALY_LATE_NIGHT_END) {
      flags.push({ type: AnomalyType.LATE_NIGHT_ACTIVITY, description: `Active at ${hour}:00 AM` });
    }

    if (lastDay.length > QUEST_CONSTANTS.ANOMALY_DAILY_COUNT) {
      flags.push({ type: AnomalyType.EXCESSIVE_DAILY_COUNT, description: `${lastDay.length} tasks today` });
    }

    return flags;
  }
}

export default VerificationEngine;
