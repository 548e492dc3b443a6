import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { authenticate, getActor } from '../../middleware/auth.js';
import { parseQuery, validate } from '../../middleware/validate.js';
import { Notification } from '../../models/index.js';
import { AppError } from '../../utils/appError.js';
import { paginate, paginationMeta } from '../../utils/helpers.js';
import { idParamSchema, paginationQuery } from '../../utils/validation.js';

const router = Router();

const listQuerySchema = paginationQuery(20).extend({
  filter: z.enum(['all', 'unread', 'read']).default('all'),
});

router.use(authenticate);

// Get notifications for current user
router.get(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const query = parseQuery(listQuerySchema, req);
    const recipientId = getActor(req).id;

    const filter: Record<string, unknown> = { recipientId };
    if (query.filter === 'unread') filter.isRead = false;
    if (query.filter === 'read') filter.isRead = true;

    const { skip, limit } = paginate(query.page, query.limit);
    const [items, total, totalCount, unreadCount] = await Promise.all([
      Notification.find(filter)
        .populate('senderId', 'username firstName lastName')
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit),
      Notification.countDocuments(filter),
      Notification.countDocuments({ recipientId }),
      Notification.countDocuments({ recipientId, isRead: false }),
    ]);

    res.json({
      success: true,
      data: {
        items,
        ...paginationMeta(query.page, query.limit, total),
        counts: { total: totalCount, unread: unreadCount, read: totalCount - unreadCount },
      },
    });
  }),
);

router.get(
  '/unread-count',
  asyncHandler(async (req: Request, res: Response) => {
    const count = await Notification.countDocuments({ recipientId: getActor(req).id, isRead: false });
    res.json({ success: true, data: { count } });
  }),
);

// Latest five, for the header dropdown
router.get(
  '/recent',
  asyncHandler(async (req: Request, res: Response) => {
    const recipientId = getActor(req).id;
    const [items, unreadCount] = await Promise.all([
      Notification.find({ recipientId }).sort({ createdAt: -1 }).limit(5),
      Notification.countDocuments({ recipientId, isRead: false }),
    ]);
    res.json({ success: true, data: { items, unreadCount } });
  }),
);

// Mark all as read
router.patch(
  '/read-all',
  asyncHandler(async (req: Request, res: Response) => {
    const result = await Notification.updateMany(
      { recipientId: getActor(req).id, isRead: false },
      { isRead: true, readAt: new Date() },
    );
    res.json({ success: true, data: { updated: result.modifiedCount } });
  }),
);

// Mark notification as read
router.patch(
  '/:id/read',
  validate(idParamSchema, 'params'),
  asyncHandler(async (req: Request, res: Response) => {
    const notification = await Notification.findOne({ _id: req.params.id, recipientId: getActor(req).id });
    if (!notification) throw AppError.notFound('Notification not found');

    if (!notification.isRead) {
      notification.isRead = true;
      notification.readAt = new Date();
      await notification.save();
    }
    res.json({ success: true, data: notification });
  }),
);

router.delete(
  '/:id',
  validate(idParamSchema, 'params'),
  asyncHandler(async (req: Request, res: Response) => {
    const deleted = await Notification.findOneAndDelete({ _id: req.params.id, recipientId: getActor(req).id });
    if (!deleted) throw AppError.notFound('Notification not found');
    res.json({ success: true, data: { message: 'Notification deleted' } });
  }),
);

// Clear all
router.delete(
  '/',
  asyncHandler(async (req: Request, res: Response) => {
    const result = await Notification.deleteMany({ recipientId: getActor(req).id });
    res.json({ success: true, data: { deleted: result.deletedCount } });
  }),
);

export default router;
