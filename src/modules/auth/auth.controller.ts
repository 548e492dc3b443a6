import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { env } from '../../config/env.js';
import { generateCsrfToken } from '../../middleware/csrf.js';
import { getActor } from '../../middleware/auth.js';
import { AppError } from '../../utils/appError.js';
import * as authService from './auth.service.js';

const COOKIE_OPTIONS = {
  httpOnly: true,
  secure: env.COOKIE_SECURE,
  sameSite: env.COOKIE_SAMESITE,
  domain: env.COOKIE_DOMAIN,
  path: '/',
};

const CSRF_COOKIE_OPTIONS = {
  httpOnly: false,
  secure: env.COOKIE_SECURE,
  sameSite: env.COOKIE_SAMESITE,
  domain: env.COOKIE_DOMAIN,
  path: '/',
};

export const login = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.login(req.body, req.ip, req.headers['user-agent']);
  const maxAge = env.JWT_ACCESS_EXPIRY_SECONDS * 1000;

  res.cookie('accessToken', result.accessToken, { ...COOKIE_OPTIONS, maxAge });

  const csrfToken = generateCsrfToken();
  res.cookie('csrfToken', csrfToken, { ...CSRF_COOKIE_OPTIONS, maxAge });

  res.json({
    success: true,
    data: {
      user: result.user,
      accessToken: result.accessToken,
      csrfToken,
    },
  });
});

export const logout = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  await authService.logout(actor.id, req.ip, req.headers['user-agent']);

  res.clearCookie('accessToken', COOKIE_OPTIONS);
  res.clearCookie('csrfToken', CSRF_COOKIE_OPTIONS);

  res.json({ success: true, data: { message: 'Logged out successfully' } });
});

export const changePassword = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await authService.changePassword(actor.id, req.body, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});

export const me = asyncHandler(async (req: Request, res: Response) => {
  if (!req.user) throw AppError.unauthorized();
  res.json({ success: true, data: authService.toPublicUser(req.user) });
});
