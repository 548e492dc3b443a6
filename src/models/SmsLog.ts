import mongoose, { Schema, Document, Types } from 'mongoose';
import { SmsLogStatus } from '../utils/constants.js';

export interface ISmsLog extends Document {
  _id: Types.ObjectId;
  customerId: Types.ObjectId;
  orderId?: Types.ObjectId;
  phoneNumber: string;
  message: string;
  status: SmsLogStatus;
  response?: string;
  sentAt?: Date;
  createdAt: Date;
}

const smsLogSchema = new Schema<ISmsLog>(
  {
    customerId: { type: Schema.Types.ObjectId, ref: 'Customer', required: true },
    orderId: { type: Schema.Types.ObjectId, ref: 'Order' },
    phoneNumber: { type: String, required: true },
    message: { type: String, required: true },
    status: { type: String, enum: Object.values(SmsLogStatus), default: SmsLogStatus.PENDING },
    response: { type: String },
    sentAt: { type: Date },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

smsLogSchema.index({ status: 1, createdAt: -1 });
smsLogSchema.index({ orderId: 1 });

export const SmsLog = mongoose.model<ISmsLog>('SmsLog', smsLogSchema);
