import mongoose, { Schema, Document, Types } from 'mongoose';
import { PaymentMethod, PaymentStatus, PaymentType } from '../utils/constants.js';

export interface IPayment extends Document {
  _id: Types.ObjectId;
  paymentNumber: string;
  orderId: Types.ObjectId;
  amount: number;
  paymentType: PaymentType;
  paymentMethod: PaymentMethod;
  status: PaymentStatus;
  notes?: string;
  receivedBy: Types.ObjectId;
  paymentDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

const paymentSchema = new Schema<IPayment>(
  {
    paymentNumber: { type: String, required: true, unique: true },
    orderId: { type: Schema.Types.ObjectId, ref: 'Order', required: true },
    amount: { type: Number, required: true, min: 0.01 },
    paymentType: { type: String, enum: Object.values(PaymentType), required: true },
    paymentMethod: { type: String, enum: Object.values(PaymentMethod), default: PaymentMethod.CASH },
    status: { type: String, enum: Object.values(PaymentStatus), default: PaymentStatus.COMPLETED },
    notes: { type: String, trim: true },
    receivedBy: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    paymentDate: { type: Date, default: Date.now },
  },
  { timestamps: true },
);

paymentSchema.index({ orderId: 1, status: 1 });
paymentSchema.index({ paymentDate: -1 });

export const Payment = mongoose.model<IPayment>('Payment', paymentSchema);
