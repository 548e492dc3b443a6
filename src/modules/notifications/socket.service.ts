import { Server as SocketServer, Socket } from 'socket.io';
import { Server as HttpServer } from 'http';
import { env } from '../../config/env.js';
import { verifyAccessToken } from '../../middleware/auth.js';
import { Notification, User } from '../../models/index.js';
import { NotificationPriority, NotificationType, Role } from '../../utils/constants.js';
import { socketLogger as logger } from '../../utils/logger.js';
import type { Types } from 'mongoose';

export interface NotificationPayload {
  id: Types.ObjectId;
  type: NotificationType;
  title: string;
  message: string;
  priority: NotificationPriority;
  actionUrl?: string;
  isRead: boolean;
  createdAt: Date;
}

interface ServerToClientEvents {
  'notification:new': (payload: NotificationPayload) => void;
}

type ClientToServerEvents = Record<string, never>;
type InterServerEvents = Record<string, never>;

interface SocketData {
  userId: string;
  roles: Role[];
}

type TailorShopServer = SocketServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type TailorShopSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

let io: TailorShopServer | null = null;

export interface NotificationInput {
  recipientId: string | Types.ObjectId;
  senderId?: string | Types.ObjectId;
  type: NotificationType;
  title: string;
  message: string;
  priority?: NotificationPriority;
  orderId?: Types.ObjectId;
  taskId?: Types.ObjectId;
  actionUrl?: string;
}

export function initializeSocket(httpServer: HttpServer): TailorShopServer {
  const server = new SocketServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: {
      origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()),
      credentials: true,
    },
  });

  server.use(async (socket: TailorShopSocket, next) => {
    try {
      const token: unknown = socket.handshake.auth?.token ?? socket.handshake.query?.token;
      if (typeof token !== 'string' || !token) {
        next(new Error('Authentication required'));
        return;
      }

      const decoded = verifyAccessToken(token);
      const user = await User.findById(decoded.userId);
      if (!user || !user.isActive) {
        next(new Error('Invalid user'));
        return;
      }

      socket.data.userId = decoded.userId;
      socket.data.roles = user.roles;
      next();
    } catch (error) {
      logger.debug({ err: error }, 'Socket authentication failed');
      next(new Error('Authentication failed'));
    }
  });

  server.on('connection', (socket: TailorShopSocket) => {
    const { userId, roles } = socket.data;

    // Join personal room
    void socket.join(`user:${userId}`);

    // Join role-based rooms
    for (const role of roles) {
      void socket.join(`role:${role}`);
    }

    logger.debug(`Socket connected: user ${userId}`);

    socket.on('disconnect', () => {
      logger.debug(`Socket disconnected: user ${userId}`);
    });
  });

  io = server;
  return server;
}

export function closeSocket(): Promise<void> {
  if (!io) return Promise.resolve();
  const server = io;
  io = null;
  return new Promise((resolve) => {
    void server.close(() => resolve());
  });
}

// ── Notification Helpers ──

/**
 * Persist an in-app notification and push it to the recipient's room.
 * Failures are logged: a notification never fails the operation that raised it.
 */
export async function createAndSendNotification(input: NotificationInput): Promise<void> {
  try {
    const notification = await Notification.create({
      recipientId: input.recipientId,
      senderId: input.senderId,
      type: input.type,
      title: input.title,
      message: input.message,
      priority: input.priority ?? NotificationPriority.NORMAL,
      orderId: input.orderId,
      taskId: input.taskId,
      actionUrl: input.actionUrl,
    });

    if (io) {
      io.to(`user:${input.recipientId.toString()}`).emit('notification:new', {
        id: notification._id,
        type: notification.type,
        title: notification.title,
        message: notification.message,
        priority: notification.priority,
        actionUrl: notification.actionUrl,
        isRead: false,
        createdAt: notification.createdAt,
      });
    }
  } catch (error) {
    logger.error({ err: error }, 'Failed to create notification');
  }
}

export async function notifyRole(
  role: Role,
  notification: Omit<NotificationInput, 'recipientId'>,
): Promise<void> {
  try {
    const users = await User.find({ roles: role, isActive: true });
    for (const user of users) {
      await createAndSendNotification({ ...notification, recipientId: user._id });
    }
  } catch (error) {
    logger.error({ err: error }, 'Failed to notify role');
  }
}
