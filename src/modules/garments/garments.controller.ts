import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import * as garmentsService from './garments.service.js';

export const createGarmentType = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const garment = await garmentsService.createGarmentType(req.body, actor.id, req.ip, req.headers['user-agent']);
  res.status(201).json({ success: true, data: garment });
});

export const listGarmentTypes = asyncHandler(async (_req: Request, res: Response) => {
  const garments = await garmentsService.listGarmentTypes();
  res.json({ success: true, data: garments });
});

export const getGarmentType = asyncHandler(async (req: Request, res: Response) => {
  const result = await garmentsService.getGarmentType(req.params.id);
  res.json({ success: true, data: result });
});

export const getGarmentRequirements = asyncHandler(async (req: Request, res: Response) => {
  const result = await garmentsService.getGarmentRequirements(req.params.id);
  res.json({ success: true, data: result });
});

export const updateGarmentType = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const garment = await garmentsService.updateGarmentType(
    req.params.id,
    req.body,
    actor.id,
    req.ip,
    req.headers['user-agent'],
  );
  res.json({ success: true, data: garment });
});

export const upsertGarmentAccessory = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const garment = await garmentsService.upsertGarmentAccessory(req.params.id, req.body, actor.id);
  res.json({ success: true, data: garment });
});

export const removeGarmentAccessory = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const garment = await garmentsService.removeGarmentAccessory(req.params.id, req.params.accessoryId, actor.id);
  res.json({ success: true, data: garment });
});

export const deleteGarmentType = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await garmentsService.deleteGarmentType(req.params.id, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});
