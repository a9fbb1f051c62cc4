import mongoose, { Schema, Document, Types } from 'mongoose';
import { AuditAction } from '../utils/constants.js';

export interface IAuditLog extends Document {
  _id: Types.ObjectId;
  action: AuditAction;
  targetType?: string; // 'request' | 'slot' | 'assignment' | 'config' | 'cycle'
  targetId?: string;
  details?: Record<string, unknown>;
  createdAt: Date;
}

const auditLogSchema = new Schema<IAuditLog>(
  {
    action: { type: String, enum: Object.values(AuditAction), required: true },
    targetType: { type: String },
    targetId: { type: String },
    details: { type: Schema.Types.Mixed },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

auditLogSchema.index({ action: 1 });
auditLogSchema.index({ targetType: 1, targetId: 1 });
auditLogSchema.index({ createdAt: -1 });

export const AuditLog = mongoose.model<IAuditLog>('AuditLog', auditLogSchema);
