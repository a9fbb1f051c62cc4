import mongoose, { Schema, Document, Types } from 'mongoose';
import { AssignmentStatus } from '../utils/constants.js';

export interface IAssignment extends Document {
  _id: Types.ObjectId;
  assignmentId: string;
  requestId: string;
  guardianId: string;
  slotId: string;
  decidedAt: Date;
  reason: string; // matched-preference-N | promoted-from-waitlist | manual-override
  status: AssignmentStatus;
  cancelledAt: Date | null;
  replacesAssignmentId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const assignmentSchema = new Schema<IAssignment>(
  {
    assignmentId: { type: String, required: true, unique: true },
    requestId: { type: String, required: true },
    guardianId: { type: String, required: true },
    slotId: { type: String, required: true },
    decidedAt: { type: Date, required: true },
    reason: { type: String, required: true },
    status: {
      type: String,
      enum: Object.values(AssignmentStatus),
      default: AssignmentStatus.ACTIVE,
    },
    cancelledAt: { type: Date, default: null },
    replacesAssignmentId: { type: String, default: null },
  },
  { timestamps: true },
);

assignmentSchema.index({ slotId: 1, status: 1 });
assignmentSchema.index({ guardianId: 1, status: 1 });
assignmentSchema.index({ requestId: 1 });

export const Assignment = mongoose.model<IAssignment>('Assignment', assignmentSchema);
