import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import * as ordersService from './orders.service.js';
import { listOrdersQuerySchema } from './orders.validation.js';

export const createOrder = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await ordersService.createOrder(req.body, actor.id, req.ip, req.get('user-agent'));
  res.status(201).json({ success: true, data: result });
});

export const listOrders = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(listOrdersQuerySchema, req);
  const result = await ordersService.listOrders(query);
  res.json({ success: true, data: result });
});

export const getOrder = asyncHandler(async (req: Request, res: Response) => {
  const result = await ordersService.getOrder(req.params.id);
  res.json({ success: true, data: result });
});

export const updateOrder = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const order = await ordersService.updateOrder(req.params.id, req.body, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data: order });
});

export const cancelOrder = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const order = await ordersService.cancelOrder(req.params.id, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data: order });
});
