import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { sendPdf } from '../../utils/sendPdf.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import { generateCommissionReportPdf, generateTableReportPdf } from '../../services/receipt.service.js';
import * as commissionsService from './commissions.service.js';
import {
  adminReportQuerySchema,
  commissionHistoryQuerySchema,
  tailorReportQuerySchema,
} from './commissions.validation.js';

export const getDashboard = asyncHandler(async (req: Request, res: Response) => {
  const data = await commissionsService.getCommissionDashboard(getActor(req).id);
  res.json({ success: true, data });
});

export const listHistory = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(commissionHistoryQuerySchema, req);
  const data = await commissionsService.listCommissionHistory(query, getActor(req));
  res.json({ success: true, data });
});

export const getTailorReportPdf = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(tailorReportQuerySchema, req);
  const { report, filename } = await commissionsService.buildTailorCommissionReport(query, getActor(req));
  sendPdf(res, filename, await generateCommissionReportPdf(report), 'attachment');
});

export const getAdminReport = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(adminReportQuerySchema, req);

  if (query.format === 'pdf') {
    const { report, filename } = await commissionsService.buildAdminCommissionReport(query);
    sendPdf(res, filename, await generateCommissionReportPdf(report), 'attachment');
    return;
  }

  const { rows: _rows, ...data } = await commissionsService.getAdminCommissionReport(query);
  res.json({ success: true, data });
});

export const getGarmentReport = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(adminReportQuerySchema, req);
  const { range, garments, pdf, filename } = await commissionsService.getGarmentProductionReport(query);

  if (query.format === 'pdf') {
    sendPdf(res, filename, await generateTableReportPdf(pdf), 'attachment');
    return;
  }
  res.json({ success: true, data: { range, garments } });
});

export const getPerformanceReport = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(adminReportQuerySchema, req);
  const { range, tailors, pdf, filename } = await commissionsService.getTailorPerformanceReport(query);

  if (query.format === 'pdf') {
    sendPdf(res, filename, await generateTableReportPdf(pdf), 'attachment');
    return;
  }
  res.json({ success: true, data: { range, tailors } });
});

export const markPaid = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const data = await commissionsService.markCommissionsPaid(req.body, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data });
});
