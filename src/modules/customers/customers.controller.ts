import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { getActor } from '../../middleware/auth.js';
import { parseQuery } from '../../middleware/validate.js';
import { listCustomersQuerySchema, searchCustomersQuerySchema } from './customers.validation.js';
import * as customersService from './customers.service.js';

export const createCustomer = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const customer = await customersService.createCustomer(req.body, actor.id, req.ip, req.headers['user-agent']);
  res.status(201).json({ success: true, data: customer });
});

export const listCustomers = asyncHandler(async (req: Request, res: Response) => {
  const result = await customersService.listCustomers(parseQuery(listCustomersQuerySchema, req));
  res.json({ success: true, data: result });
});

export const searchCustomers = asyncHandler(async (req: Request, res: Response) => {
  const { q } = parseQuery(searchCustomersQuerySchema, req);
  const customers = await customersService.searchCustomers(q);
  res.json({ success: true, data: { customers } });
});

export const getCustomer = asyncHandler(async (req: Request, res: Response) => {
  const result = await customersService.getCustomer(req.params.id);
  res.json({ success: true, data: result });
});

export const updateCustomer = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const customer = await customersService.updateCustomer(
    req.params.id,
    req.body,
    actor.id,
    req.ip,
    req.headers['user-agent'],
  );
  res.json({ success: true, data: customer });
});

export const deleteCustomer = asyncHandler(async (req: Request, res: Response) => {
  const actor = getActor(req);
  const result = await customersService.deleteCustomer(req.params.id, actor.id, req.ip, req.headers['user-agent']);
  res.json({ success: true, data: result });
});
