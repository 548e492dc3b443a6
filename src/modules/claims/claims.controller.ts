import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import * as claimsService from './claims.service.js';

export const listClaims = asyncHandler(async (_req: Request, res: Response) => {
  const data = await claimsService.listClaims();
  res.json({ success: true, data });
});

export const processClaim = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const data = await claimsService.processClaim(req.params.id, req.body, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data });
});
