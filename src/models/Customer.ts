import mongoose, { Schema, Document, Types } from 'mongoose';

export interface ICustomer extends Document {
  _id: Types.ObjectId;
  name: string;
  contactNumber: string;
  address?: string;
  email?: string;
  createdAt: Date;
  updatedAt: Date;
}

const customerSchema = new Schema<ICustomer>(
  {
    name: { type: String, required: true, trim: true, maxlength: 200 },
    contactNumber: { type: String, required: true, trim: true, maxlength: 20 },
    address: { type: String, trim: true },
    email: { type: String, trim: true, lowercase: true },
  },
  { timestamps: true },
);

customerSchema.index({ name: 1 });
customerSchema.index({ contactNumber: 1 });
customerSchema.index({ createdAt: -1 });

export const Customer = mongoose.model<ICustomer>('Customer', customerSchema);
