import { Schema, model, Model } from 'mongoose';
import { ConfirmationKind, ConfirmationStatus, IPendingConfirmation } from '@/types';

const confirmationSchema = new Schema<IPendingConfirmation>({
  token: {
    type: String,
    required: true,
    unique: true,
    index: true,
  },
  taskId: { type: String, required: true, index: true },
  characterId: { type: String, required: true },
  bondId: { type: String },
  kind: {
    type: String,
    enum: Object.values(ConfirmationKind),
    required: true,
  },
  expDelta: { type: Number, required: true, min: 0 },
  goldDelta: { type: Number, required: true, min: 0 },
  bondExpDelta: { type: Number, required: true, min: 0 },
  status: {
    type: String,
    enum: Object.values(ConfirmationStatus),
    default: ConfirmationStatus.PENDING,
  },
  createdAt: { type: Date, default: Date.now },
  resolvedAt: { type: Date },
}, {
  versionKey: false,
});

// Resolved tokens are kept for a month for auditing
confirmationSchema.index({ resolvedAt: 1 }, { expireAfterSeconds: 30 * 24 * 60 * 60 });

export const Confirmation: Model<IPendingConfirmation> = model<IPendingConfirmation>('Confirmation', confirmationSchema);

export default Confirmation;
