import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IConfig extends Document {
  _id: Types.ObjectId;
  key: string;
  value: unknown;
  updatedAt: Date;
  createdAt: Date;
}

const configSchema = new Schema<IConfig>(
  {
    key: { type: String, required: true, unique: true },
    value: { type: Schema.Types.Mixed, required: true },
  },
  { timestamps: true },
);

export const Config = mongoose.model<IConfig>('Config', configSchema);
