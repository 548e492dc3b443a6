import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env.js';
import { User, IUser } from '../models/index.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { Role } from '../utils/constants.js';

// Extend Express Request
declare global {
  namespace Express {
    interface Request {
      user?: IUser;
      userId?: string;
      userRoles?: Role[];
    }
  }
}

const jwtPayloadSchema = z.object({
  userId: z.string(),
  roles: z.array(z.nativeEnum(Role)),
});

export type AccessTokenPayload = z.infer<typeof jwtPayloadSchema>;

export interface Actor {
  id: string;
  roles: Role[];
  isAdmin: boolean;
}

function readToken(req: Request): string | undefined {
  const cookieToken: unknown = req.cookies?.accessToken;
  if (typeof cookieToken === 'string' && cookieToken) {
    return cookieToken;
  }
  if (req.headers.authorization?.startsWith('Bearer ')) {
    return req.headers.authorization.split(' ')[1];
  }
  return undefined;
}

export function signAccessToken(payload: AccessTokenPayload): string {
  return jwt.sign(payload, env.JWT_ACCESS_SECRET, { expiresIn: env.JWT_ACCESS_EXPIRY_SECONDS });
}

export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, env.JWT_ACCESS_SECRET);
  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw AppError.unauthorized('Invalid access token', ErrorCode.TOKEN_INVALID);
  }
  return parsed.data;
}

/**
 * Authenticate user via access token (httpOnly cookie or Authorization header).
 */
export const authenticate = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
  try {
    const token = readToken(req);
    if (!token) {
      throw AppError.unauthorized('Access token required', ErrorCode.TOKEN_INVALID);
    }

    const decoded = verifyAccessToken(token);

    const user = await User.findById(decoded.userId);
    if (!user) {
      throw AppError.unauthorized('User not found', ErrorCode.TOKEN_INVALID);
    }

    if (!user.isActive) {
      throw AppError.forbidden('Account is disabled', ErrorCode.ACCOUNT_DISABLED);
    }

    req.user = user;
    req.userId = user._id.toString();
    req.userRoles = user.roles;
    next();
  } catch (error) {
    if (error instanceof AppError) {
      next(error);
      return;
    }
    if (error instanceof jwt.TokenExpiredError) {
      next(AppError.unauthorized('Access token expired', ErrorCode.TOKEN_EXPIRED));
      return;
    }
    if (error instanceof jwt.JsonWebTokenError) {
      next(AppError.unauthorized('Invalid access token', ErrorCode.TOKEN_INVALID));
      return;
    }
    next(error);
  }
};

/**
 * The authenticated caller. Controllers behind `authenticate` use this
 * instead of reading req.userId directly.
 */
export function getActor(req: Request): Actor {
  if (!req.userId || !req.userRoles) {
    throw AppError.unauthorized('Authentication required');
  }
  return {
    id: req.userId,
    roles: req.userRoles,
    isAdmin: req.userRoles.includes(Role.ADMIN),
  };
}
