import mongoose, { Schema, Document, Types } from 'mongoose';
import { TaskStatus } from '../utils/constants.js';

export interface ITailoringTask extends Document {
  _id: Types.ObjectId;
  orderId: Types.ObjectId;
  tailorId: Types.ObjectId;
  status: TaskStatus;
  notes?: string;
  commissionRate: number;
  commissionAmount: number;
  commissionPaid: boolean;
  assignedDate: Date;
  startedDate?: Date;
  completedDate?: Date;
  approvedDate?: Date;
  approvedBy?: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const tailoringTaskSchema = new Schema<ITailoringTask>(
  {
    orderId: { type: Schema.Types.ObjectId, ref: 'Order', required: true, unique: true },
    tailorId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    status: { type: String, enum: Object.values(TaskStatus), default: TaskStatus.ASSIGNED },
    notes: { type: String, trim: true },
    commissionRate: { type: Number, default: 10, min: 0, max: 100 },
    commissionAmount: { type: Number, default: 0, min: 0 },
    commissionPaid: { type: Boolean, default: false },
    assignedDate: { type: Date, default: Date.now },
    startedDate: { type: Date },
    completedDate: { type: Date },
    approvedDate: { type: Date },
    approvedBy: { type: Schema.Types.ObjectId, ref: 'User' },
  },
  { timestamps: true },
);

tailoringTaskSchema.index({ tailorId: 1, status: 1 });
tailoringTaskSchema.index({ status: 1 });

export const TailoringTask = mongoose.model<ITailoringTask>('TailoringTask', tailoringTaskSchema);
