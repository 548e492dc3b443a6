import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IFabric extends Document {
  _id: Types.ObjectId;
  name: string;
  color: string;
  stockMeters: number;
  pricePerMeter: number;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

const fabricSchema = new Schema<IFabric>(
  {
    name: { type: String, required: true, trim: true, maxlength: 100 },
    color: { type: String, required: true, trim: true, maxlength: 50 },
    stockMeters: { type: Number, required: true, min: 0, default: 0 },
    pricePerMeter: { type: Number, required: true, min: 0 },
    description: { type: String, trim: true },
  },
  { timestamps: true },
);

fabricSchema.index({ name: 1, color: 1 });
fabricSchema.index({ stockMeters: 1 });

export const Fabric = mongoose.model<IFabric>('Fabric', fabricSchema);
