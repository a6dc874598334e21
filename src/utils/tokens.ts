import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';
import { AppError, ErrorCode } from './errors';

export type TokenType = 'access' | 'refresh';

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  type: z.enum(['access', 'refresh'])
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

const signToken = (userId: string, type: TokenType, expiresIn: number): string =>
  jwt.sign({ userId, type }, env.JWT_SECRET, { algorithm: 'HS256', expiresIn });

export const signAccessToken = (userId: string): string =>
  signToken(userId, 'access', env.JWT_EXPIRES_IN);

export const signRefreshToken = (userId: string): string =>
  signToken(userId, 'refresh', env.JWT_REFRESH_EXPIRES_IN);

/**
 * Verifies signature, expiry and token type. Throws a 401 AppError otherwise.
 */
export const verifyToken = (token: string, expectedType: TokenType): TokenPayload => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, env.JWT_SECRET, { algorithms: ['HS256'] });
  } catch (error) {
    const message = error instanceof jwt.TokenExpiredError ? 'Token has expired' : 'Invalid token';
    throw new AppError(ErrorCode.UNAUTHORIZED, message, 401);
  }

  const payload = tokenPayloadSchema.safeParse(decoded);
  if (!payload.success || payload.data.type !== expectedType) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid token', 401);
  }

  return payload.data;
};

export const bearerToken = (authorization: string | undefined): string | undefined => {
  if (!authorization) {
    return undefined;
  }
  const [scheme, token] = authorization.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
};
