import { Request, Response, NextFunction } from 'express';
import User, { IUser, UserRole } from '../models/User';
import { sendError, AppError, ErrorCode } from '../utils/errors';
import { bearerToken, verifyToken } from '../utils/tokens';

export interface AuthRequest extends Request {
  user?: IUser;
}

export const authenticateToken = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const token = bearerToken(req.headers['authorization']);
    if (!token) {
      return res.status(401).json({ error: 'Access token required', code: ErrorCode.UNAUTHORIZED });
    }

    const { userId } = verifyToken(token, 'access');

    const user = await User.findById(userId);
    if (!user || !user.isActive) {
      return res.status(401).json({ error: 'Invalid or inactive user', code: ErrorCode.UNAUTHORIZED });
    }

    req.user = user;
    next();
  } catch (error) {
    sendError(res, error, 'Authentication failed');
  }
};

export const requireRoles = (...roles: UserRole[]) =>
  (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return sendError(res, new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required', 401), 'Authentication required');
    }
    if (!roles.includes(req.user.role)) {
      return sendError(res, new AppError(ErrorCode.FORBIDDEN, 'Insufficient permissions', 403), 'Insufficient permissions');
    }
    next();
  };

export const requireAdmin = requireRoles('admin');

// Stock managers may change the catalogue alongside admins; everyone else reads
export const requireCatalogWriter = requireRoles('admin', 'manager');
