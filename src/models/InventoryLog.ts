import mongoose, { Schema, Document, Types } from 'mongoose';
import { InventoryAction, InventoryItemType } from '../utils/constants.js';

export interface IInventoryLog extends Document {
  _id: Types.ObjectId;
  itemType: InventoryItemType;
  fabricId?: Types.ObjectId;
  accessoryId?: Types.ObjectId;
  action: InventoryAction;
  quantity: number;
  previousStock: number;
  newStock: number;
  orderId?: Types.ObjectId;
  notes?: string;
  createdBy?: Types.ObjectId;
  createdAt: Date;
}

const inventoryLogSchema = new Schema<IInventoryLog>(
  {
    itemType: { type: String, enum: Object.values(InventoryItemType), required: true },
    fabricId: { type: Schema.Types.ObjectId, ref: 'Fabric' },
    accessoryId: { type: Schema.Types.ObjectId, ref: 'Accessory' },
    action: { type: String, enum: Object.values(InventoryAction), required: true },
    quantity: { type: Number, required: true },
    previousStock: { type: Number, required: true },
    newStock: { type: Number, required: true },
    orderId: { type: Schema.Types.ObjectId, ref: 'Order' },
    notes: { type: String },
    createdBy: { type: Schema.Types.ObjectId, ref: 'User' },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

inventoryLogSchema.index({ createdAt: -1 });
inventoryLogSchema.index({ itemType: 1, action: 1 });
inventoryLogSchema.index({ orderId: 1 });

export const InventoryLog = mongoose.model<IInventoryLog>('InventoryLog', inventoryLogSchema);
