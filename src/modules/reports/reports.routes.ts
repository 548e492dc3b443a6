import { Router } from 'express';
import * as ctrl from './reports.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { Role } from '../../utils/constants.js';

const router = Router();

router.get('/dashboard', authenticate, ctrl.getDashboard);

router.get('/sales', authenticate, authorize(Role.ADMIN), ctrl.getSalesReport);

export default router;
