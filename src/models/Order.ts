import mongoose, { Schema, Document, Types } from 'mongoose';
import { OrderStatus } from '../utils/constants.js';

export interface IOrderAccessory {
  accessoryId: Types.ObjectId;
  quantityUsed: number;
}

export interface IOrder extends Document {
  _id: Types.ObjectId;
  orderNumber: string;
  customerId: Types.ObjectId;
  garmentTypeId: Types.ObjectId;
  fabricId: Types.ObjectId;
  quantity: number;
  fabricMetersUsed: number;
  accessories: IOrderAccessory[];
  measurements: Record<string, number>;
  specialInstructions?: string;
  totalPrice: number;
  depositAmount: number;
  balanceAmount: number;
  status: OrderStatus;
  orderDate: Date;
  dueDate?: Date;
  completedDate?: Date;
  deliveredDate?: Date;
  createdBy: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const orderAccessorySchema = new Schema<IOrderAccessory>(
  {
    accessoryId: { type: Schema.Types.ObjectId, ref: 'Accessory', required: true },
    quantityUsed: { type: Number, required: true, min: 0 },
  },
  { _id: false },
);

const orderSchema = new Schema<IOrder>(
  {
    orderNumber: { type: String, required: true, unique: true },
    customerId: { type: Schema.Types.ObjectId, ref: 'Customer', required: true },
    garmentTypeId: { type: Schema.Types.ObjectId, ref: 'GarmentType', required: true },
    fabricId: { type: Schema.Types.ObjectId, ref: 'Fabric', required: true },
    quantity: { type: Number, required: true, min: 1, default: 1 },
    fabricMetersUsed: { type: Number, required: true, min: 0 },
    accessories: { type: [orderAccessorySchema], default: [] },
    measurements: { type: Schema.Types.Mixed, default: {} },
    specialInstructions: { type: String, trim: true },
    totalPrice: { type: Number, required: true, min: 0 },
    depositAmount: { type: Number, default: 0, min: 0 },
    balanceAmount: { type: Number, default: 0, min: 0 },
    status: { type: String, enum: Object.values(OrderStatus), default: OrderStatus.PENDING },
    orderDate: { type: Date, default: Date.now },
    dueDate: { type: Date },
    completedDate: { type: Date },
    deliveredDate: { type: Date },
    createdBy: { type: Schema.Types.ObjectId, ref: 'User', required: true },
  },
  { timestamps: true },
);

orderSchema.index({ status: 1, createdAt: -1 });
orderSchema.index({ customerId: 1 });
orderSchema.index({ garmentTypeId: 1 });

export const Order = mongoose.model<IOrder>('Order', orderSchema);
