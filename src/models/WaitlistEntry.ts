import mongoose, { Schema, Document, Types } from 'mongoose';
import { WaitlistReason } from '../utils/constants.js';

export interface IPriorityScore {
  siblingBonus: number;
  completenessBonus: number;
  distanceRank: number;
  urgency: number;
  submittedAt: number; // epoch ms
  requestId: string;
}

export interface IWaitlistEntry extends Document {
  _id: Types.ObjectId;
  requestId: string;
  guardianId: string;
  slotId: string | null; // null = no preference, manual only
  score: IPriorityScore;
  reason: WaitlistReason;
  autoPromote: boolean;
  decidedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const priorityScoreSchema = new Schema<IPriorityScore>(
  {
    siblingBonus: { type: Number, required: true },
    completenessBonus: { type: Number, required: true },
    distanceRank: { type: Number, required: true },
    urgency: { type: Number, required: true },
    submittedAt: { type: Number, required: true },
    requestId: { type: String, required: true },
  },
  { _id: false },
);

const waitlistEntrySchema = new Schema<IWaitlistEntry>(
  {
    requestId: { type: String, required: true, unique: true },
    guardianId: { type: String, required: true },
    slotId: { type: String, default: null },
    score: { type: priorityScoreSchema, required: true },
    reason: { type: String, enum: Object.values(WaitlistReason), required: true },
    autoPromote: { type: Boolean, required: true },
    decidedAt: { type: Date, required: true },
  },
  { timestamps: true },
);

waitlistEntrySchema.index({ slotId: 1 });

export const WaitlistEntry = mongoose.model<IWaitlistEntry>('WaitlistEntry', waitlistEntrySchema);
