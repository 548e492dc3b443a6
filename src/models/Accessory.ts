import mongoose, { Schema, Document, Types } from 'mongoose';
import { AccessoryUnit } from '../utils/constants.js';

export interface IAccessory extends Document {
  _id: Types.ObjectId;
  name: string;
  unit: AccessoryUnit;
  stockQuantity: number;
  pricePerUnit: number;
  description?: string;
  createdAt: Date;
  updatedAt: Date;
}

const accessorySchema = new Schema<IAccessory>(
  {
    name: { type: String, required: true, trim: true, maxlength: 100 },
    unit: { type: String, enum: Object.values(AccessoryUnit), default: AccessoryUnit.PIECES },
    stockQuantity: { type: Number, required: true, min: 0, default: 0 },
    pricePerUnit: { type: Number, required: true, min: 0 },
    description: { type: String, trim: true },
  },
  { timestamps: true },
);

accessorySchema.index({ name: 1 });
accessorySchema.index({ stockQuantity: 1 });

export const Accessory = mongoose.model<IAccessory>('Accessory', accessorySchema);
