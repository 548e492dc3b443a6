import bcrypt from 'bcryptjs';
import { User, AuditLog, IUser } from '../../models/index.js';
import { signAccessToken } from '../../middleware/auth.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction } from '../../utils/constants.js';
import type { LoginInput, ChangePasswordInput } from './auth.validation.js';

export const BCRYPT_ROUNDS = 12;

export function toPublicUser(user: IUser) {
  return {
    _id: user._id,
    id: user._id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    phone: user.phone,
    roles: user.roles,
    isActive: user.isActive,
    lastLoginAt: user.lastLoginAt,
  };
}

export async function login(input: LoginInput, ip?: string, ua?: string) {
  const { login: identifier, password } = input;

  const user = await User.findOne({
    $or: [{ username: identifier }, { email: identifier }],
  }).select('+password');

  if (!user) {
    await AuditLog.create({
      action: AuditAction.LOGIN_FAILED,
      actorUsername: identifier,
      details: { reason: 'User not found' },
      ipAddress: ip,
      userAgent: ua,
    });
    throw AppError.unauthorized('Invalid username or password', ErrorCode.INVALID_CREDENTIALS);
  }

  if (!user.isActive) {
    throw AppError.forbidden('Account is disabled', ErrorCode.ACCOUNT_DISABLED);
  }

  const isMatch = await bcrypt.compare(password, user.password);
  if (!isMatch) {
    await AuditLog.create({
      action: AuditAction.LOGIN_FAILED,
      actorId: user._id,
      actorUsername: user.username,
      details: { reason: 'Wrong password' },
      ipAddress: ip,
      userAgent: ua,
    });
    throw AppError.unauthorized('Invalid username or password', ErrorCode.INVALID_CREDENTIALS);
  }

  const accessToken = signAccessToken({ userId: user._id.toString(), roles: user.roles });

  user.lastLoginAt = new Date();
  await user.save();

  await AuditLog.create({
    action: AuditAction.LOGIN,
    actorId: user._id,
    actorUsername: user.username,
    targetType: 'user',
    targetId: user._id,
    ipAddress: ip,
    userAgent: ua,
  });

  return { accessToken, user: toPublicUser(user) };
}

export async function logout(userId: string, ip?: string, ua?: string) {
  await AuditLog.create({
    action: AuditAction.LOGOUT,
    actorId: userId,
    targetType: 'user',
    targetId: userId,
    ipAddress: ip,
    userAgent: ua,
  });
}

export async function changePassword(userId: string, input: ChangePasswordInput, ip?: string, ua?: string) {
  const { currentPassword, newPassword } = input;

  const user = await User.findById(userId).select('+password');
  if (!user) throw AppError.notFound('User not found');

  const isMatch = await bcrypt.compare(currentPassword, user.password);
  if (!isMatch) {
    throw AppError.badRequest('Current password is incorrect', ErrorCode.INVALID_CREDENTIALS);
  }

  user.password = await bcrypt.hash(newPassword, BCRYPT_ROUNDS);
  await user.save();

  await AuditLog.create({
    action: AuditAction.PASSWORD_CHANGED,
    actorId: user._id,
    targetType: 'user',
    targetId: user._id,
    ipAddress: ip,
    userAgent: ua,
  });

  return { message: 'Password changed successfully' };
}
