import { describe, it, expect } from '@jest/globals';
import { VerificationEngine, requiresLocation, requiresPhoto } from '../../src/services/verification';
import { calculateDestination } from '../../src/utils/geo';
import { AnomalyType, TaskCategory, VerificationTier, VerificationType } from '../../src/types';
import { T0, makeTask } from '../helpers';

const at = (ms: number) => new Date(T0.getTime() + ms);

describe('Verification Engine', () => {
  describe('isPhotoTimestampValid', () => {
    it('should accept photos up to five minutes old, inclusive', () => {
      expect(VerificationEngine.isPhotoTimestampValid(T0, at(0))).toBe(true);
      expect(VerificationEngine.isPhotoTimestampValid(T0, at(300000))).toBe(true);
      expect(VerificationEngine.isPhotoTimestampValid(T0, at(300001))).toBe(false);
    });

    it('should tolerate a small clock skew into the future', () => {
      expect(VerificationEngine.isPhotoTimestampValid(at(5000), T0)).toBe(true);
      expect(VerificationEngine.isPhotoTimestampValid(at(5001), T0)).toBe(false);
    });

    it('should reject invalid dates', () => {
      expect(VerificationEngine.isPhotoTimestampValid(new Date('not a date'), T0)).toBe(false);
    });
  });

  describe('verifyGeofence', () => {
    const center = { lat: 40.7128, lng: -74.006 };

    it.each([100, 200, 500])('should place points inside and outside a %im radius', (radius) => {
      for (const bearing of [0, 90, 225]) {
        const inside = calculateDestination(center, bearing, radius * 0.5);
        const outside = calculateDestination(center, bearing, radius * 1.5);

        const near = VerificationEngine.verifyGeofence(center.lat, center.lng, radius, inside.lat, inside.lng);
        const far = VerificationEngine.verifyGeofence(center.lat, center.lng, radius, outside.lat, outside.lng);

        expect(near.inRange).toBe(true);
        expect(near.distance).toBeCloseTo(radius * 0.5, 3);
        expect(near.radius).toBe(radius);
        expect(far.inRange).toBe(false);
        expect(far.distance).toBeCloseTo(radius * 1.5, 3);
      }
    });

    it.each([100, 200, 500])('should treat the %im boundary as inclusive', (radius) => {
      for (const bearing of [0, 90, 225]) {
        const justInside = calculateDestination(center, bearing, radius - 0.5);
        const justOutside = calculateDestination(center, bearing, radius + 0.5);

        expect(
          VerificationEngine.verifyGeofence(center.lat, center.lng, radius, justInside.lat, justInside.lng).inRange
        ).toBe(true);
        expect(
          VerificationEngine.verifyGeofence(center.lat, center.lng, radius, justOutside.lat, justOutside.lng).inRange
        ).toBe(false);
      }
    });

    it('should count a point exactly on the radius as in range', () => {
      const edge = calculateDestination(center, 45, 200);
      const { distance } = VerificationEngine.verifyGeofence(center.lat, center.lng, 0, edge.lat, edge.lng);

      const result = VerificationEngine.verifyGeofence(center.lat, center.lng, distance, edge.lat, edge.lng);
      expect(result.inRange).toBe(true);
      expect(result.distance).toBe(result.radius);
    });

    it('should report zero distance for coincident points', () => {
      const result = VerificationEngine.verifyGeofence(center.lat, center.lng, 10, center.lat, center.lng);
      expect(result).toEqual({ inRange: true, distance: 0, radius: 10, distanceText: '0m' });
    });

    it('should handle antipodal points', () => {
      const result = VerificationEngine.verifyGeofence(0, 0, 1000, 0, 180);
      expect(result.inRange).toBe(false);
      expect(result.distance).toBeCloseTo(Math.PI * 6371e3, 3);
      expect(result.distanceText).toBe('20015.1 km');
    });
  });

  describe('minimumDurationSeconds', () => {
    it('should depend on verification type and category', () => {
      expect(VerificationEngine.minimumDurationSeconds(makeTask())).toBe(0);
      expect(VerificationEngine.minimumDurationSeconds(makeTask({ verificationType: VerificationType.PHOTO }))).toBe(60);
      expect(VerificationEngine.minimumDurationSeconds(makeTask({ verificationType: VerificationType.BOTH }))).toBe(60);
      expect(VerificationEngine.minimumDurationSeconds(makeTask({ verificationType: VerificationType.LOCATION }))).toBe(
        300
      );
      expect(
        VerificationEngine.minimumDurationSeconds(
          makeTask({ verificationType: VerificationType.LOCATION, category: TaskCategory.MENTAL })
        )
      ).toBe(120);
      expect(
        VerificationEngine.minimumDurationSeconds(
          makeTask({ verificationType: VerificationType.LOCATION, category: TaskCategory.SOCIAL })
        )
      ).toBe(60);
    });

    it('should let an explicit minimum lengthen the wait', () => {
      expect(
        VerificationEngine.minimumDurationSeconds(
          makeTask({ verificationType: VerificationType.PHOTO, minimumDurationSeconds: 90 })
        )
      ).toBe(90);
      expect(VerificationEngine.minimumDurationSeconds(makeTask({ minimumDurationSeconds: 30 }))).toBe(30);
    });

    it('should never let an explicit minimum shorten the policy wait', () => {
      const photo = makeTask({ verificationType: VerificationType.PHOTO, minimumDurationSeconds: 0 });
      expect(VerificationEngine.minimumDurationSeconds(photo)).toBe(60);
      expect(
        VerificationEngine.minimumDurationSeconds(
          makeTask({ verificationType: VerificationType.LOCATION, minimumDurationSeconds: 45 })
        )
      ).toBe(300);

      expect(VerificationEngine.canComplete(photo, T0)).toEqual({
        allowed: false,
        code: 'MIN_DURATION_NOT_MET',
        reason: 'Please wait 1m 0s before completing this task.',
        remainingSeconds: 60,
      });
    });
  });

  describe('canComplete', () => {
    it('should allow an unverified task immediately', () => {
      expect(VerificationEngine.canComplete(makeTask(), T0)).toEqual({ allowed: true, remainingSeconds: 0 });
    });

    it('should report the remaining wait first', () => {
      const task = makeTask({ verificationType: VerificationType.PHOTO });
      expect(VerificationEngine.canComplete(task, at(30000))).toEqual({
        allowed: false,
        code: 'MIN_DURATION_NOT_MET',
        reason: 'Please wait 30s before completing this task.',
        remainingSeconds: 30,
      });
    });

    it('should format waits over a minute', () => {
      const task = makeTask({ verificationType: VerificationType.LOCATION });
      const check = VerificationEngine.canComplete(task, T0);
      expect(check.reason).toBe('Please wait 5m 0s before completing this task.');
      expect(check.remainingSeconds).toBe(300);
    });

    it('should require a fresh photo after the wait', () => {
      const task = makeTask({ verificationType: VerificationType.PHOTO });
      expect(VerificationEngine.canComplete(task, at(61000)).code).toBe('PHOTO_REQUIRED');

      task.proof.photo = { byteLength: 1024, capturedAt: at(1000), motionDetected: false };
      expect(VerificationEngine.canComplete(task, at(301001)).code).toBe('PHOTO_EXPIRED');
      expect(VerificationEngine.canComplete(task, at(301000)).allowed).toBe(true);
    });

    it('should require a location for location tasks', () => {
      const task = makeTask({ verificationType: VerificationType.LOCATION, category: TaskCategory.SOCIAL });
      const check = VerificationEngine.canComplete(task, at(60000));
      expect(check.code).toBe('LOCATION_REQUIRED');
      expect(check.reason).toBe('Capture your location to verify this task.');
    });

    it('should reject tasks past their deadline', () => {
      const task = makeTask({ dueDate: at(1000) });
      expect(VerificationEngine.canComplete(task, at(1000)).allowed).toBe(true);
      expect(VerificationEngine.canComplete(task, at(1001)).code).toBe('DEADLINE_PASSED');
    });
  });

  describe('assessTier', () => {
    const geofence = { lat: 40.7128, lng: -74.006, radius: 200 };

    it('should award no extra credit without proof', () => {
      expect(VerificationEngine.assessTier(makeTask(), T0)).toEqual({
        tier: VerificationTier.NONE,
        multiplier: 1,
        lootChanceBonus: 0,
        geofence: undefined,
      });
    });

    it('should add the motion bonus to a valid photo', () => {
      const task = makeTask({ verificationType: VerificationType.PHOTO });
      task.proof.photo = { byteLength: 10, capturedAt: T0, motionDetected: true };
      const assessment = VerificationEngine.assessTier(task, T0);
      expect(assessment.tier).toBe(VerificationTier.PHOTO);
      expect(assessment.multiplier).toBeCloseTo(1.6);
      expect(assessment.lootChanceBonus).toBe(0.05);
    });

    it('should ignore an expired photo', () => {
      const task = makeTask({ verificationType: VerificationType.PHOTO });
      task.proof.photo = { byteLength: 10, capturedAt: T0, motionDetected: true };
      const assessment = VerificationEngine.assessTier(task, at(400000));
      expect(assessment.tier).toBe(VerificationTier.NONE);
      expect(assessment.multiplier).toBe(1);
    });

    it('should halve the extra credit outside the geofence', () => {
      const task = makeTask({ verificationType: VerificationType.LOCATION, geofence });
      task.proof.location = calculateDestination(geofence, 0, 400);
      const assessment = VerificationEngine.assessTier(task, T0);
      expect(assessment.tier).toBe(VerificationTier.LOCATION);
      expect(assessment.multiplier).toBe(1.25);
      expect(assessment.lootChanceBonus).toBe(0.02);
      expect(assessment.geofence?.inRange).toBe(false);
    });

    it('should combine photo and location', () => {
      const task = makeTask({ verificationType: VerificationType.BOTH, geofence });
      task.proof.photo = { byteLength: 10, capturedAt: T0, motionDetected: false };
      task.proof.location = calculateDestination(geofence, 90, 50);
      expect(VerificationEngine.assessTier(task, T0)).toMatchObject({
        tier: VerificationTier.BOTH,
        multiplier: 2,
        lootChanceBonus: 0.08,
      });

      task.proof.location = calculateDestination(geofence, 90, 400);
      expect(VerificationEngine.assessTier(task, T0)).toMatchObject({ multiplier: 1.5, lootChanceBonus: 0.05 });
    });
  });

  describe('detectAnomalies', () => {
    it('should flag rapid completions', () => {
      const recent = Array.from({ length: 6 }, (_, i) => at(-i * 60000));
      const flags = VerificationEngine.detectAnomalies(recent, T0);
      expect(flags).toEqual([{ type: AnomalyType.RAPID_COMPLETION, description: '6 tasks in 10 minutes' }]);
    });

    it('should flag late-night activity', () => {
      const flags = VerificationEngine.detectAnomalies([], new Date('2025-03-10T03:15:00.000Z'));
      expect(flags).toEqual([{ type: AnomalyType.LATE_NIGHT_ACTIVITY, description: 'Active at 3:00 AM' }]);
    });

    it('should flag an excessive daily count', () => {
      const recent = Array.from({ length: 21 }, (_, i) => at(-(i + 1) * 3600000 + 60000));
      const flags = VerificationEngine.detectAnomalies(recent, T0);
      expect(flags.map((f) => f.type)).toEqual([AnomalyType.EXCESSIVE_DAILY_COUNT]);
    });

    it('should return nothing for ordinary activity', () => {
      expect(VerificationEngine.detectAnomalies([at(-3600000)], T0)).toEqual([]);
    });
  });

  it('should know which types need which proof', () => {
    expect(requiresPhoto(VerificationType.BOTH)).toBe(true);
    expect(requiresPhoto(VerificationType.LOCATION)).toBe(false);
    expect(requiresLocation(VerificationType.BOTH)).toBe(true);
    expect(requiresLocation(VerificationType.PHOTO)).toBe(false);
  });
});
