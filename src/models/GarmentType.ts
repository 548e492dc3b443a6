import mongoose, { Schema, Document, Types } from 'mongoose';
import { GarmentCategory } from '../utils/constants.js';

export interface IGarmentAccessory {
  accessoryId: Types.ObjectId;
  quantityRequired: number;
}

export interface IGarmentType extends Document {
  _id: Types.ObjectId;
  name: string;
  description?: string;
  category: GarmentCategory;
  estimatedFabricMeters: number;
  basePrice: number;
  defaultTailorId?: Types.ObjectId;
  requiredAccessories: IGarmentAccessory[];
  createdAt: Date;
  updatedAt: Date;
}

const garmentAccessorySchema = new Schema<IGarmentAccessory>(
  {
    accessoryId: { type: Schema.Types.ObjectId, ref: 'Accessory', required: true },
    quantityRequired: { type: Number, required: true, min: 0, default: 1 },
  },
  { _id: false },
);

const garmentTypeSchema = new Schema<IGarmentType>(
  {
    name: { type: String, required: true, unique: true, trim: true, maxlength: 100 },
    description: { type: String, trim: true },
    category: { type: String, enum: Object.values(GarmentCategory), default: GarmentCategory.BOTH },
    estimatedFabricMeters: { type: Number, required: true, min: 0 },
    basePrice: { type: Number, required: true, min: 0 },
    defaultTailorId: { type: Schema.Types.ObjectId, ref: 'User' },
    requiredAccessories: { type: [garmentAccessorySchema], default: [] },
  },
  { timestamps: true },
);

export const GarmentType = mongoose.model<IGarmentType>('GarmentType', garmentTypeSchema);
