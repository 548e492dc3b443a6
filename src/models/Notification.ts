import mongoose, { Schema, Document, Types } from 'mongoose';
import { NotificationPriority, NotificationType } from '../utils/constants.js';

export interface INotification extends Document {
  _id: Types.ObjectId;
  recipientId: Types.ObjectId;
  senderId?: Types.ObjectId;
  type: NotificationType;
  title: string;
  message: string;
  priority: NotificationPriority;
  orderId?: Types.ObjectId;
  taskId?: Types.ObjectId;
  actionUrl?: string; // Frontend route to navigate to
  isRead: boolean;
  readAt?: Date;
  createdAt: Date;
}

const notificationSchema = new Schema<INotification>(
  {
    recipientId: { type: Schema.Types.ObjectId, ref: 'User', required: true },
    senderId: { type: Schema.Types.ObjectId, ref: 'User' },
    type: { type: String, enum: Object.values(NotificationType), default: NotificationType.GENERAL },
    title: { type: String, required: true, maxlength: 200 },
    message: { type: String, required: true },
    priority: { type: String, enum: Object.values(NotificationPriority), default: NotificationPriority.NORMAL },
    orderId: { type: Schema.Types.ObjectId, ref: 'Order' },
    taskId: { type: Schema.Types.ObjectId, ref: 'TailoringTask' },
    actionUrl: { type: String },
    isRead: { type: Boolean, default: false },
    readAt: { type: Date },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

notificationSchema.index({ recipientId: 1, isRead: 1, createdAt: -1 });

export const Notification = mongoose.model<INotification>('Notification', notificationSchema);
