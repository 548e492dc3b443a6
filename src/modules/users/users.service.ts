import bcrypt from 'bcryptjs';
import { User, AuditLog, TailoringTask } from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction, OPEN_TASK_STATUSES, Role } from '../../utils/constants.js';
import { escapeRegex, paginate, paginationMeta } from '../../utils/helpers.js';
import { BCRYPT_ROUNDS, toPublicUser } from '../auth/auth.service.js';
import type { CreateUserInput, UpdateUserInput, ListUsersQuery } from './users.validation.js';

// Admin: Create staff account
export async function createUser(input: CreateUserInput, adminId: string, ip?: string, ua?: string) {
  const existing = await User.findOne({ $or: [{ username: input.username }, { email: input.email }] });
  if (existing) throw AppError.conflict('Username or email already registered', ErrorCode.DUPLICATE_ENTRY);

  const hashedPassword = await bcrypt.hash(input.password, BCRYPT_ROUNDS);

  const user = await User.create({
    username: input.username,
    email: input.email,
    password: hashedPassword,
    firstName: input.firstName,
    lastName: input.lastName,
    phone: input.phone,
    roles: [input.role],
  });

  await AuditLog.create({
    action: AuditAction.USER_CREATED,
    actorId: adminId,
    targetType: 'user',
    targetId: user._id,
    details: { role: input.role },
    ipAddress: ip,
    userAgent: ua,
  });

  return toPublicUser(user);
}

// Admin: List users
export async function listUsers(query: ListUsersQuery) {
  const filter: Record<string, unknown> = {};

  if (query.role) filter.roles = query.role;
  if (query.isActive !== undefined) filter.isActive = query.isActive;
  if (query.search) {
    const pattern = { $regex: escapeRegex(query.search), $options: 'i' };
    filter.$or = [{ username: pattern }, { firstName: pattern }, { lastName: pattern }, { email: pattern }];
  }

  const { skip, limit } = paginate(query.page, query.limit);
  const [users, total] = await Promise.all([
    User.find(filter).sort({ createdAt: -1 }).skip(skip).limit(limit),
    User.countDocuments(filter),
  ]);

  return { items: users.map(toPublicUser), ...paginationMeta(query.page, query.limit, total) };
}

export async function getUser(userId: string) {
  const user = await User.findById(userId);
  if (!user) throw AppError.notFound('User not found');
  return toPublicUser(user);
}

// Admin: Update user
export async function updateUser(userId: string, input: UpdateUserInput, adminId: string, ip?: string, ua?: string) {
  const user = await User.findById(userId);
  if (!user) throw AppError.notFound('User not found');

  if (input.email && input.email !== user.email) {
    const taken = await User.exists({ email: input.email, _id: { $ne: user._id } });
    if (taken) throw AppError.conflict('Email already registered', ErrorCode.DUPLICATE_ENTRY);
    user.email = input.email;
  }
  if (input.firstName) user.firstName = input.firstName;
  if (input.lastName) user.lastName = input.lastName;
  if (input.phone !== undefined) user.phone = input.phone;
  if (input.role) {
    if (user._id.toString() === adminId && input.role !== Role.ADMIN) {
      throw AppError.badRequest('You cannot remove your own admin role');
    }
    user.roles = [input.role];
  }

  await user.save();

  await AuditLog.create({
    action: AuditAction.USER_UPDATED,
    actorId: adminId,
    targetType: 'user',
    targetId: user._id,
    details: { changes: Object.keys(input) },
    ipAddress: ip,
    userAgent: ua,
  });

  return toPublicUser(user);
}

// Admin: Activate / deactivate
export async function toggleUserActive(userId: string, adminId: string, ip?: string, ua?: string) {
  if (userId === adminId) {
    throw AppError.badRequest('You cannot deactivate your own account');
  }

  const user = await User.findById(userId);
  if (!user) throw AppError.notFound('User not found');

  user.isActive = !user.isActive;
  await user.save();

  await AuditLog.create({
    action: user.isActive ? AuditAction.USER_ENABLED : AuditAction.USER_DISABLED,
    actorId: adminId,
    targetType: 'user',
    targetId: user._id,
    ipAddress: ip,
    userAgent: ua,
  });

  return toPublicUser(user);
}

/**
 * Active tailors with their open workload, fewest open tasks first.
 */
export async function listTailors() {
  const tailors = await User.find({ roles: Role.TAILOR, isActive: true }).sort({ firstName: 1 });
  const counts = await TailoringTask.aggregate<{ _id: unknown; count: number }>([
    { $match: { tailorId: { $in: tailors.map((t) => t._id) }, status: { $in: OPEN_TASK_STATUSES } } },
    { $group: { _id: '$tailorId', count: { $sum: 1 } } },
  ]);
  const countByTailor = new Map(counts.map((c) => [String(c._id), c.count]));

  return tailors
    .map((t) => ({ ...toPublicUser(t), openTasks: countByTailor.get(t._id.toString()) ?? 0 }))
    .sort((a, b) => a.openTasks - b.openTasks);
}
