import { Router } from 'express';
import { z } from 'zod';
import * as paymentsController from './payments.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { idempotent } from '../../middleware/idempotency.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema, objectIdSchema } from '../../utils/validation.js';
import { createPaymentSchema } from './payments.validation.js';

const router = Router();

router.use(authenticate, authorize(Role.ADMIN));

const orderParamSchema = z.object({ orderId: objectIdSchema });

router.get('/', paymentsController.listPayments);
router.post('/', validate(createPaymentSchema), idempotent(), paymentsController.recordPayment);

// ── Receipts (?format=html|pdf) ──
router.get('/orders/:orderId/receipt', validate(orderParamSchema, 'params'), paymentsController.getOrderReceipt);
router.get('/orders/:orderId/claim-receipt', validate(orderParamSchema, 'params'), paymentsController.getClaimReceipt);

router.get('/:id', validate(idParamSchema, 'params'), paymentsController.getPayment);
router.get('/:id/receipt', validate(idParamSchema, 'params'), paymentsController.getPaymentReceipt);

export default router;
