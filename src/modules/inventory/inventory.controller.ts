import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import * as inventoryService from './inventory.service.js';
import { inventoryLogQuerySchema, stockCheckQuerySchema } from './inventory.validation.js';

export const getDashboard = asyncHandler(async (_req: Request, res: Response) => {
  const result = await inventoryService.getInventoryDashboard();
  res.json({ success: true, data: result });
});

export const getLowStock = asyncHandler(async (_req: Request, res: Response) => {
  const result = await inventoryService.getLowStock();
  res.json({ success: true, data: result });
});

export const listLogs = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(inventoryLogQuerySchema, req);
  const result = await inventoryService.listInventoryLogs(query);
  res.json({ success: true, data: result });
});

export const checkFabricStock = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(stockCheckQuerySchema, req);
  const result = await inventoryService.checkFabricStock(query);
  res.json({ success: true, data: result });
});

// ── Fabrics ──

export const listFabrics = asyncHandler(async (_req: Request, res: Response) => {
  const fabrics = await inventoryService.listFabrics();
  res.json({ success: true, data: fabrics });
});

export const getFabric = asyncHandler(async (req: Request, res: Response) => {
  const fabric = await inventoryService.getFabric(req.params.id);
  res.json({ success: true, data: fabric });
});

export const createFabric = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const fabric = await inventoryService.createFabric(req.body, actor.id, req.ip, req.headers['user-agent']);
  res.status(201).json({ success: true, data: fabric });
});

export const updateFabric = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const fabric = await inventoryService.updateFabric(
    req.params.id,
    req.body,
    actor.id,
    req.ip,
    req.headers['user-agent'],
  );
  res.json({ success: true, data: fabric });
});

export const addFabricStock = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await inventoryService.addFabricStock(req.params.id, req.body, actor.id);
  res.json({ success: true, data: result });
});

export const deleteFabric = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await inventoryService.deleteFabric(req.params.id, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});

// ── Accessories ──

export const listAccessories = asyncHandler(async (_req: Request, res: Response) => {
  const accessories = await inventoryService.listAccessories();
  res.json({ success: true, data: accessories });
});

export const getAccessory = asyncHandler(async (req: Request, res: Response) => {
  const accessory = await inventoryService.getAccessory(req.params.id);
  res.json({ success: true, data: accessory });
});

export const createAccessory = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const accessory = await inventoryService.createAccessory(req.body, actor.id, req.ip, req.headers['user-agent']);
  res.status(201).json({ success: true, data: accessory });
});

export const updateAccessory = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const accessory = await inventoryService.updateAccessory(
    req.params.id,
    req.body,
    actor.id,
    req.ip,
    req.headers['user-agent'],
  );
  res.json({ success: true, data: accessory });
});

export const addAccessoryStock = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await inventoryService.addAccessoryStock(req.params.id, req.body, actor.id);
  res.json({ success: true, data: result });
});

export const deleteAccessory = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await inventoryService.deleteAccessory(req.params.id, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});
