import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import { listUsersQuerySchema } from './users.validation.js';
import * as usersService from './users.service.js';

export const createUser = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await usersService.createUser(req.body, actor.id, req.ip, req.headers['user-agent']);
  res.status(201).json({ success: true, data: result });
});

export const listUsers = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.listUsers(parseQuery(listUsersQuerySchema, req));
  res.json({ success: true, data: result });
});

export const getUser = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.getUser(req.params.id);
  res.json({ success: true, data: result });
});

export const updateUser = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await usersService.updateUser(req.params.id, req.body, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});

export const toggleUserActive = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await usersService.toggleUserActive(req.params.id, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});

export const listTailors = asyncHandler(async (_req: Request, res: Response) => {
  const result = await usersService.listTailors();
  res.json({ success: true, data: result });
});
