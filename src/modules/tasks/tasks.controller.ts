import type { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import * as tasksService from './tasks.service.js';
import { listTasksQuerySchema } from './tasks.validation.js';

export const assignTask = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const task = await tasksService.assignTask(req.body, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data: task });
});

export const listTasks = asyncHandler(async (req: Request, res: Response) => {
  const query = parseQuery(listTasksQuerySchema, req);
  const result = await tasksService.listTasks(query, getActor(req));
  res.json({ success: true, data: result });
});

export const getTask = asyncHandler(async (req: Request, res: Response) => {
  const result = await tasksService.getTask(req.params.id, getActor(req));
  res.json({ success: true, data: result });
});

export const updateTaskNotes = asyncHandler(async (req: Request, res: Response) => {
  const task = await tasksService.updateTaskNotes(req.params.id, req.body, getActor(req));
  res.json({ success: true, data: task });
});

export const updateTaskStatus = asyncHandler(async (req: Request, res: Response) => {
  const task = await tasksService.updateTaskStatus(
    req.params.id,
    req.body,
    getActor(req),
    req.ip,
    req.get('user-agent'),
  );
  res.json({ success: true, data: task });
});

export const approveTask = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await tasksService.approveTask(req.params.id, actor.id, req.ip, req.get('user-agent'));
  res.json({ success: true, data: result });
});
