import mongoose, { Schema, Document, Types } from 'mongoose';

/**
 * Consultation slot. `occupancy` is only ever written through a
 * compare-and-set on its previous value.
 */
export interface ITimeSlot extends Document {
  _id: Types.ObjectId;
  slotId: string;
  startsAt: Date;
  endsAt: Date;
  capacity: number;
  occupancy: number;
  blackout: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const timeSlotSchema = new Schema<ITimeSlot>(
  {
    slotId: { type: String, required: true, unique: true },
    startsAt: { type: Date, required: true },
    endsAt: { type: Date, required: true },
    capacity: { type: Number, required: true, min: 1 },
    occupancy: { type: Number, default: 0, min: 0 },
    blackout: { type: Boolean, default: false },
  },
  { timestamps: true },
);

timeSlotSchema.index({ startsAt: 1 });

export const TimeSlot = mongoose.model<ITimeSlot>('TimeSlot', timeSlotSchema);
