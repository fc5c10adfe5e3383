import { Schema, model, Model } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { CharacterClass, ICharacter, ItemRarity, MaterialType, StatType } from '@/types';

export type CharacterRecord = Omit<ICharacter, 'id'> & { _id: string };

const statField = { type: Number, default: 5, min: 0 };

const equipmentSchema = new Schema({
  id: { type: String, required: true },
  name: { type: String, required: true },
  tier: { type: Number, required: true, min: 1 },
  rarity: { type: String, enum: Object.values(ItemRarity), required: true },
  bonusStat: { type: String, enum: Object.values(StatType), required: true },
  bonusAmount: { type: Number, required: true, min: 0 },
  acquiredAt: { type: Date, required: true },
}, { _id: false });

const materialSchema = new Schema({
  type: { type: String, enum: Object.values(MaterialType), required: true },
  rarity: { type: String, enum: Object.values(ItemRarity), required: true },
  quantity: { type: Number, required: true, min: 0 },
}, { _id: false });

const characterSchema = new Schema<CharacterRecord>({
  _id: {
    type: String,
    default: () => uuidv4(),
  },
  name: {
    type: String,
    required: true,
    trim: true,
    minlength: 2,
    maxlength: 40,
  },
  characterClass: {
    type: String,
    enum: Object.values(CharacterClass),
    default: null,
  },
  level: { type: Number, default: 1, min: 1 },
  exp: { type: Number, default: 0, min: 0 },
  gold: { type: Number, default: 0, min: 0 },
  unspentStatPoints: { type: Number, default: 0, min: 0 },
  stats: {
    strength: statField,
    wisdom: statField,
    charisma: statField,
    dexterity: statField,
    luck: statField,
    defense: statField,
  },
  streak: {
    current: { type: Number, default: 0, min: 0 },
    longest: { type: Number, default: 0, min: 0 },
    lastActiveDay: { type: String },
  },
  tasksCompleted: { type: Number, default: 0, min: 0 },
  onboardingComplete: { type: Boolean, default: false },

  dutyClaimsDay: { type: String },
  dutyClaimsCount: { type: Number, default: 0, min: 0 },
  dutyShuffleDay: { type: String },
  dutyShuffleCount: { type: Number, default: 0, min: 0 },

  inventory: {
    consumables: { type: Schema.Types.Mixed, default: {} },
    materials: { type: [materialSchema], default: [] },
    equipment: { type: [equipmentSchema], default: [] },
  },
  createdAt: { type: Date, default: Date.now },
}, {
  versionKey: false,
  minimize: false,
});

characterSchema.index({ level: -1, exp: -1 });

export const Character: Model<CharacterRecord> = model<CharacterRecord>('Character', characterSchema);

export function toCharacter(record: CharacterRecord): ICharacter {
  const { _id, ...rest } = record;
  return { ...rest, id: _id, characterClass: rest.characterClass ?? null };
}

export function toCharacterRecord(character: ICharacter): CharacterRecord {
  const { id, ...rest } = character;
  return { ...rest, _id: id };
}

export default Character;
