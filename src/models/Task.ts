import { Schema, model, Model } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import {
  CompletionMode,
  ITask,
  MiniGameKind,
  TaskCategory,
  TaskStatus,
  VerificationType,
} from '@/types';

export type TaskRecord = Omit<ITask, 'id'> & { _id: string };

const coordinatesSchema = new Schema({
  lat: { type: Number, required: true, min: -90, max: 90 },
  lng: { type: Number, required: true, min: -180, max: 180 },
}, { _id: false });

const geofenceSchema = new Schema({
  lat: { type: Number, required: true, min: -90, max: 90 },
  lng: { type: Number, required: true, min: -180, max: 180 },
  radius: { type: Number, required: true, min: 1 },
  name: { type: String, trim: true },
}, { _id: false });

const photoProofSchema = new Schema({
  byteLength: { type: Number, required: true, min: 1 },
  capturedAt: { type: Date, required: true },
  motionDetected: { type: Boolean, default: false },
}, { _id: false });

const taskSchema = new Schema<TaskRecord>({
  _id: {
    type: String,
    default: () => uuidv4(),
  },
  ownerId: {
    type: String,
    required: true,
    index: true,
  },
  title: {
    type: String,
    required: true,
    trim: true,
    maxlength: 120,
  },
  description: {
    type: String,
    default: '',
    maxlength: 1000,
  },
  category: {
    type: String,
    enum: Object.values(TaskCategory),
    required: true,
  },
  verificationType: {
    type: String,
    enum: Object.values(VerificationType),
    default: VerificationType.NONE,
  },
  status: {
    type: String,
    enum: Object.values(TaskStatus),
    default: TaskStatus.PENDING,
    index: true,
  },
  completionMode: {
    type: String,
    enum: Object.values(CompletionMode),
    default: CompletionMode.STANDARD,
  },
  miniGameKind: {
    type: String,
    enum: Object.values(MiniGameKind),
  },
  createdAt: { type: Date, default: Date.now },
  startedAt: { type: Date },
  completedAt: { type: Date },
  dueDate: { type: Date, index: true },
  minimumDurationSeconds: { type: Number, min: 0 },
  geofence: { type: geofenceSchema },
  proof: {
    photo: { type: photoProofSchema },
    location: { type: coordinatesSchema },
  },
  customExp: { type: Number, min: 0 },
  customGold: { type: Number, min: 0 },

  isOnDutyBoard: { type: Boolean, default: false },
  isDailyDuty: { type: Boolean, default: false },
  isHabit: { type: Boolean, default: false },
  isRecurring: { type: Boolean, default: false },
  isFromPartner: { type: Boolean, default: false },
  isSharedWithPartner: { type: Boolean, default: false },
  isCoop: { type: Boolean, default: false },

  dutyDay: { type: String },
  isBonusDuty: { type: Boolean },

  habitDueTime: {
    type: String,
    match: /^([01]\d|2[0-3]):([0-5]\d)$/,
  },
  habitCompletedOn: { type: String },
  habitFailedOn: { type: String },
  habitStreak: { type: Number, default: 0, min: 0 },
  habitLongestStreak: { type: Number, default: 0, min: 0 },

  coopPairId: { type: String, index: true, sparse: true },
  coopBonusAwarded: { type: Boolean, default: false },
  partnerConfirmed: { type: Boolean, default: false },
}, {
  versionKey: false,
});

// Indexes
taskSchema.index({ ownerId: 1, status: 1 });
taskSchema.index({ ownerId: 1, isDailyDuty: 1, dutyDay: 1 });
taskSchema.index({ status: 1, dueDate: 1 });

export const Task: Model<TaskRecord> = model<TaskRecord>('Task', taskSchema);

export function toTask(record: TaskRecord): ITask {
  const { _id, proof, ...rest } = record;
  return {
    ...rest,
    id: _id,
    proof: {
      ...(proof?.photo ? { photo: proof.photo } : {}),
      ...(proof?.location ? { location: proof.location } : {}),
    },
  };
}

export function toTaskRecord(task: ITask): TaskRecord {
  const { id, ...rest } = task;
  return { ...rest, _id: id };
}

export default Task;
