import { z } from 'zod';
import { USER_ROLES } from '../models/User';

const email = z.string().trim().toLowerCase().email('Invalid email address');
const password = z.string().min(8, 'Password must be at least 8 characters');

export const registerSchema = z.object({
  email,
  password,
  name: z.string().trim().min(1, 'Name is required').max(255),
  role: z.enum(USER_ROLES).optional()
});

export const loginSchema = z.object({
  email,
  password: z.string().min(1, 'Password is required')
});

export const refreshTokenSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token not provided')
});

export const forgotPasswordSchema = z.object({
  email
});

export const resetPasswordSchema = z.object({
  email,
  otp: z.string().regex(/^\d{6}$/, 'OTP must be 6 digits'),
  newPassword: password
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
