import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import * as reportsService from './reports.service.js';

// Admins get the shop overview, tailors their own workload
export const getDashboard = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const data = actor.isAdmin
    ? await reportsService.getAdminDashboard()
    : await reportsService.getTailorDashboard(actor.id);
  res.json({ success: true, data });
});

export const getSalesReport = asyncHandler(async (_req: Request, res: Response) => {
  const data = await reportsService.getSalesReport();
  res.json({ success: true, data });
});
