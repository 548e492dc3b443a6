import mongoose, { Schema, Document, Types } from 'mongoose';
import { CommissionStatus } from '../utils/constants.js';

export interface ITailorCommission extends Document {
  _id: Types.ObjectId;
  commissionNumber: string;
  tailorId: Types.ObjectId;
  taskId: Types.ObjectId;
  orderId: Types.ObjectId;
  orderAmount: number;
  commissionRate: number;
  commissionAmount: number;
  status: CommissionStatus;
  garmentType: string;
  quantity: number;
  customerName: string;
  earnedDate: Date;
  creditedDate?: Date;
  paidDate?: Date;
  notes?: string;
  createdAt: Date;
  updatedAt: Date;
}

const tailorCommissionSchema = new Schema<ITailorCommission>(
  {
    commissionNumber: { type: String, required: true, unique: true },
    tailorId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    taskId: { type: Schema.Types.ObjectId, ref: 'TailoringTask', required: true, unique: true },
    orderId: { type: Schema.Types.ObjectId, ref: 'Order', required: true },
    orderAmount: { type: Number, required: true, min: 0 },
    commissionRate: { type: Number, required: true, min: 0 },
    commissionAmount: { type: Number, required: true, min: 0 },
    status: { type: String, enum: Object.values(CommissionStatus), default: CommissionStatus.CREDITED },
    garmentType: { type: String, required: true },
    quantity: { type: Number, default: 1 },
    customerName: { type: String, required: true },
    earnedDate: { type: Date, default: Date.now },
    creditedDate: { type: Date },
    paidDate: { type: Date },
    notes: { type: String, trim: true },
  },
  { timestamps: true },
);

tailorCommissionSchema.index({ tailorId: 1, earnedDate: -1 });
tailorCommissionSchema.index({ status: 1 });

export const TailorCommission = mongoose.model<ITailorCommission>('TailorCommission', tailorCommissionSchema);
