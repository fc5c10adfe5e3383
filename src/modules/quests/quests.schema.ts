import { z } from 'zod';
import {
  CharacterClass,
  CompletionMode,
  MiniGameKind,
  RoutineTimeOfDay,
  TaskCategory,
  TaskStatus,
  VerificationType,
} from '@/types';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

export const CoordinatesSchema = z.object({
  lat: latitude,
  lng: longitude,
});

export const GeofenceSchema = CoordinatesSchema.extend({
  radius: z.number().positive().max(100000),
  name: z.string().max(120).optional(),
});

export const CreateTaskSchema = z.object({
  ownerId: z.string().min(1),
  title: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  category: z.nativeEnum(TaskCategory),
  verificationType: z.nativeEnum(VerificationType).optional(),
  completionMode: z.nativeEnum(CompletionMode).optional(),
  miniGameKind: z.nativeEnum(MiniGameKind).optional(),
  dueDate: z.coerce.date().optional(),
  minimumDurationSeconds: z.number().int().min(0).max(86400).optional(),
  geofence: GeofenceSchema.optional(),
  customExp: z.number().int().min(0).max(10000).optional(),
  customGold: z.number().int().min(0).max(10000).optional(),
  isHabit: z.boolean().optional(),
  habitDueTime: z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, 'must use the HH:mm format').optional(),
  isRecurring: z.boolean().optional(),
  isFromPartner: z.boolean().optional(),
  isSharedWithPartner: z.boolean().optional(),
  isCoop: z.boolean().optional(),
});

export const TaskParamsSchema = z.object({
  taskId: z.string().min(1),
});

export const ListTasksQuerySchema = z.object({
  ownerId: z.string().min(1),
  status: z.nativeEnum(TaskStatus).optional(),
});

export const StartTaskSchema = z
  .object({
    minimumDurationSeconds: z.number().int().min(0).max(86400).optional(),
  })
  .default({});

export const PhotoProofSchema = z.object({
  byteLength: z.number().int().positive(),
  capturedAt: z.coerce.date().optional(),
  motionSamples: z.array(z.number()).max(100).optional(),
});

export const LocationProofSchema = z
  .object({
    location: CoordinatesSchema.optional(),
  })
  .default({});

export const ConfirmationParamsSchema = z.object({
  token: z.string().min(1),
});

export const ApplyConfirmationSchema = z.object({
  confirmed: z.boolean(),
});

export const CreateCharacterSchema = z.object({
  name: z.string().min(1).max(60),
  characterClass: z.nativeEnum(CharacterClass).nullable().optional(),
});

export const CharacterParamsSchema = z.object({
  characterId: z.string().min(1),
});

export const CreateBondSchema = z.object({
  partnerId: z.string().min(1),
});

export const CreateRoutineSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  timeOfDay: z.nativeEnum(RoutineTimeOfDay).optional(),
  habitIds: z.array(z.string().min(1)).min(3).max(6),
});

export const ClaimDutyParamsSchema = z.object({
  characterId: z.string().min(1),
  taskId: z.string().min(1),
});

export const GeofenceCheckSchema = z.object({
  target: GeofenceSchema,
  user: CoordinatesSchema,
});

export const PhotoTimestampSchema = z.object({
  capturedAt: z.coerce.date(),
});
