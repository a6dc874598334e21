import mongoose, { Document, Schema } from 'mongoose';

export const USER_ROLES = ['admin', 'manager', 'staff'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface IUser extends Document {
  email: string;
  password: string;
  name: string;
  role: UserRole;
  isActive: boolean;
  lastLogin?: Date;
  resetToken?: string;
  resetTokenExpiry?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>({
  email: { type: String, required: true, unique: true, lowercase: true, trim: true },
  password: { type: String, required: true },
  name: { type: String, required: true },
  role: { type: String, enum: [...USER_ROLES], default: 'staff' },
  isActive: { type: Boolean, default: true },
  lastLogin: { type: Date },
  resetToken: { type: String },
  resetTokenExpiry: { type: Date }
}, {
  timestamps: true
});

export default mongoose.model<IUser>('User', UserSchema);
