import crypto from 'crypto';
import { Request, Response } from 'express';
import bcrypt from 'bcryptjs';
import User, { IUser, UserRole } from '../models/User';
import { AuthRequest } from '../middleware/auth';
import { sendPasswordResetEmail } from '../utils/emailService';
import { sendError, AppError, ErrorCode } from '../utils/errors';
import { bearerToken, signAccessToken, signRefreshToken, verifyToken } from '../utils/tokens';
import { logger } from '../config/logger';
import {
  forgotPasswordSchema,
  loginSchema,
  refreshTokenSchema,
  registerSchema,
  resetPasswordSchema
} from '../validators/auth.validator';

const SALT_ROUNDS = 12;
const OTP_TTL_MS = 10 * 60 * 1000;

export const toPublicUser = (user: IUser) => ({
  id: String(user._id),
  email: user.email,
  name: user.name,
  role: user.role,
  lastLogin: user.lastLogin
});

/**
 * Self-registration creates staff accounts. A role is only taken from the
 * body when the caller is a signed-in admin, or when no account exists yet
 * and the first user becomes the admin.
 */
const resolveRegistrationRole = async (req: Request, requested: UserRole | undefined): Promise<UserRole> => {
  if ((await User.countDocuments()) === 0) {
    return 'admin';
  }

  const token = bearerToken(req.headers['authorization']);
  if (!token || !requested) {
    return 'staff';
  }

  const { userId } = verifyToken(token, 'access');
  const caller = await User.findById(userId);
  if (!caller || !caller.isActive || caller.role !== 'admin') {
    throw new AppError(ErrorCode.FORBIDDEN, 'Only admins can assign roles', 403);
  }
  return requested;
};

export const register = async (req: Request, res: Response) => {
  try {
    const { email, password, name, role } = registerSchema.parse(req.body);

    const existingUser = await User.findOne({ email });
    if (existingUser) {
      return res.status(409).json({ error: 'User already exists', code: ErrorCode.CONFLICT });
    }

    const user = new User({
      email,
      password: await bcrypt.hash(password, SALT_ROUNDS),
      name,
      role: await resolveRegistrationRole(req, role)
    });
    await user.save();

    logger.info('User registered', { userId: String(user._id), role: user.role });

    res.status(201).json({
      message: 'User registered successfully',
      token: signAccessToken(String(user._id)),
      refreshToken: signRefreshToken(String(user._id)),
      user: toPublicUser(user)
    });
  } catch (error) {
    sendError(res, error, 'Registration failed');
  }
};

export const login = async (req: Request, res: Response) => {
  try {
    const { email, password } = loginSchema.parse(req.body);

    const user = await User.findOne({ email, isActive: true });
    if (!user) {
      return res.status(401).json({ error: 'Invalid credentials', code: ErrorCode.UNAUTHORIZED });
    }

    const isValidPassword = await bcrypt.compare(password, user.password);
    if (!isValidPassword) {
      return res.status(401).json({ error: 'Invalid credentials', code: ErrorCode.UNAUTHORIZED });
    }

    user.lastLogin = new Date();
    await user.save();

    res.json({
      message: 'Login successful',
      token: signAccessToken(String(user._id)),
      refreshToken: signRefreshToken(String(user._id)),
      user: toPublicUser(user)
    });
  } catch (error) {
    sendError(res, error, 'Login failed');
  }
};

export const refreshToken = async (req: Request, res: Response) => {
  try {
    const body = refreshTokenSchema.parse(req.body);
    const { userId } = verifyToken(body.refreshToken, 'refresh');

    const user = await User.findById(userId);
    if (!user || !user.isActive) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'User not found', 401);
    }

    res.json({ token: signAccessToken(String(user._id)) });
  } catch (error) {
    sendError(res, error, 'Token refresh failed');
  }
};

export const forgotPassword = async (req: Request, res: Response) => {
  try {
    const { email } = forgotPasswordSchema.parse(req.body);

    const user = await User.findOne({ email, isActive: true });
    if (!user) {
      return res.status(404).json({ error: 'User not found', code: ErrorCode.NOT_FOUND });
    }

    const otp = crypto.randomInt(100000, 1000000).toString();
    user.resetToken = await bcrypt.hash(otp, SALT_ROUNDS);
    user.resetTokenExpiry = new Date(Date.now() + OTP_TTL_MS);
    await user.save();

    await sendPasswordResetEmail(user.email, otp, user.name);
    res.json({ message: 'Password reset email sent successfully' });
  } catch (error) {
    sendError(res, error, 'Password reset failed');
  }
};

export const resetPassword = async (req: Request, res: Response) => {
  try {
    const { email, otp, newPassword } = resetPasswordSchema.parse(req.body);

    const user = await User.findOne({ email, resetTokenExpiry: { $gt: new Date() } });
    if (!user || !user.resetToken) {
      return res.status(400).json({ error: 'Invalid or expired OTP', code: ErrorCode.VALIDATION_ERROR });
    }

    const isValidOtp = await bcrypt.compare(otp, user.resetToken);
    if (!isValidOtp) {
      return res.status(400).json({ error: 'Invalid or expired OTP', code: ErrorCode.VALIDATION_ERROR });
    }

    user.password = await bcrypt.hash(newPassword, SALT_ROUNDS);
    user.resetToken = undefined;
    user.resetTokenExpiry = undefined;
    await user.save();

    res.json({ message: 'Password reset successful' });
  } catch (error) {
    sendError(res, error, 'Password reset failed');
  }
};

export const getProfile = async (req: AuthRequest, res: Response) => {
  if (!req.user) {
    return res.status(401).json({ error: 'Authentication required', code: ErrorCode.UNAUTHORIZED });
  }
  res.json({ user: toPublicUser(req.user) });
};

export const verifyAccessToken = async (req: Request, res: Response) => {
  const token = bearerToken(req.headers['authorization']);
  if (!token) {
    return res.status(401).json({ valid: false, error: 'Token not provided' });
  }

  try {
    const { userId } = verifyToken(token, 'access');
    const user = await User.findById(userId);

    if (!user || !user.isActive) {
      return res.status(401).json({ valid: false, error: 'Invalid or inactive user' });
    }

    res.json({ valid: true, user: toPublicUser(user) });
  } catch (error) {
    if (error instanceof AppError) {
      return res.status(401).json({ valid: false, error: 'Invalid or expired token' });
    }
    logger.error('Token verification failed', { error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ valid: false, error: 'Token verification failed' });
  }
};
