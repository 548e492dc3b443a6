import { Router } from 'express';
import * as ordersController from './orders.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { idempotent } from '../../middleware/idempotency.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import { createOrderSchema, updateOrderSchema } from './orders.validation.js';

const router = Router();

router.use(authenticate, authorize(Role.ADMIN));

router.get('/', ordersController.listOrders);
router.post('/', validate(createOrderSchema), idempotent(), ordersController.createOrder);
router.get('/:id', validate(idParamSchema, 'params'), ordersController.getOrder);
router.patch('/:id', validate(idParamSchema, 'params'), validate(updateOrderSchema), ordersController.updateOrder);
router.post('/:id/cancel', validate(idParamSchema, 'params'), ordersController.cancelOrder);

export default router;
