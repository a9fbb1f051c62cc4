import mongoose, { Schema, Document, Types } from 'mongoose';
import {
  MAX_DISTANCE_TIER,
  MAX_GRADE_LEVEL,
  MIN_DISTANCE_TIER,
  MIN_GRADE_LEVEL,
  RequestStatus,
} from '../utils/constants.js';

export interface IScoringAttributes {
  gradeLevel: number;
  siblingEnrolled: boolean;
  distanceTier: number;
  applicationComplete: boolean;
}

export interface IConsultationRequest extends Document {
  _id: Types.ObjectId;
  requestId: string;
  guardianId: string;
  studentId: string;
  desiredSlotIds: string[]; // most preferred first
  submittedAt: Date;
  attributes: IScoringAttributes;
  status: RequestStatus;
  archivedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const scoringAttributesSchema = new Schema<IScoringAttributes>(
  {
    gradeLevel: { type: Number, required: true, min: MIN_GRADE_LEVEL, max: MAX_GRADE_LEVEL },
    siblingEnrolled: { type: Boolean, required: true },
    distanceTier: { type: Number, required: true, min: MIN_DISTANCE_TIER, max: MAX_DISTANCE_TIER },
    applicationComplete: { type: Boolean, required: true },
  },
  { _id: false },
);

const consultationRequestSchema = new Schema<IConsultationRequest>(
  {
    requestId: { type: String, required: true, unique: true },
    guardianId: { type: String, required: true },
    studentId: { type: String, required: true },
    desiredSlotIds: [{ type: String }],
    submittedAt: { type: Date, required: true },
    attributes: { type: scoringAttributesSchema, required: true },
    status: {
      type: String,
      enum: Object.values(RequestStatus),
      default: RequestStatus.PENDING,
    },
    archivedAt: { type: Date, default: null },
  },
  { timestamps: true },
);

consultationRequestSchema.index({ status: 1 });
consultationRequestSchema.index({ guardianId: 1 });

export const ConsultationRequest = mongoose.model<IConsultationRequest>(
  'ConsultationRequest',
  consultationRequestSchema,
);
