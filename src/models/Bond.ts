import { Schema, model, Model } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { IBond } from '@/types';

export type BondRecord = Omit<IBond, 'id' | 'memberIds'> & { _id: string; memberIds: string[] };

const bondSchema = new Schema<BondRecord>({
  _id: {
    type: String,
    default: () => uuidv4(),
  },
  memberIds: {
    type: [String],
    required: true,
    validate: {
      validator: (ids: string[]) => ids.length === 2 && ids[0] !== ids[1],
      message: 'A bond links exactly two different characters',
    },
    index: true,
  },
  bondLevel: { type: Number, default: 1, min: 1, max: 50 },
  bondExp: { type: Number, default: 0, min: 0 },
  createdAt: { type: Date, default: Date.now },
  lastInteractionAt: { type: Date },
}, {
  versionKey: false,
});

export const Bond: Model<BondRecord> = model<BondRecord>('Bond', bondSchema);

export function toBond(record: BondRecord): IBond {
  const { _id, memberIds, ...rest } = record;
  const [first, second] = memberIds;
  if (first === undefined || second === undefined) {
    throw new Error('INVALID_BOND_RECORD');
  }
  return { ...rest, id: _id, memberIds: [first, second] };
}

export function toBondRecord(bond: IBond): BondRecord {
  const { id, memberIds, ...rest } = bond;
  return { ...rest, _id: id, memberIds: [...memberIds] };
}

export default Bond;
