import { Schema, model, Model } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { IRoutineBundle, RoutineTimeOfDay } from '@/types';

export type RoutineBundleRecord = Omit<IRoutineBundle, 'id'> & { _id: string };

const routineBundleSchema = new Schema<RoutineBundleRecord>({
  _id: {
    type: String,
    default: () => uuidv4(),
  },
  ownerId: { type: String, required: true, index: true },
  name: { type: String, required: true, trim: true, maxlength: 60 },
  description: { type: String, maxlength: 300 },
  timeOfDay: {
    type: String,
    enum: Object.values(RoutineTimeOfDay),
    default: RoutineTimeOfDay.MORNING,
  },
  habitIds: {
    type: [String],
    validate: {
      validator: (ids: string[]) => ids.length >= 3 && ids.length <= 6,
      message: 'A routine holds between 3 and 6 habits',
    },
  },
  isArchived: { type: Boolean, default: false },
  createdAt: { type: Date, default: Date.now },
}, {
  versionKey: false,
});

routineBundleSchema.index({ ownerId: 1, isArchived: 1 });

export const RoutineBundle: Model<RoutineBundleRecord> = model<RoutineBundleRecord>('RoutineBundle', routineBundleSchema);

export function toRoutineBundle(record: RoutineBundleRecord): IRoutineBundle {
  const { _id, ...rest } = record;
  return { ...rest, id: _id };
}

export function toRoutineBundleRecord(bundle: IRoutineBundle): RoutineBundleRecord {
  const { id, ...rest } = bundle;
  return { ...rest, _id: id };
}

export default RoutineBundle;
