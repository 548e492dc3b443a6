import { Router } from 'express';
import * as claimsController from './claims.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { idempotent } from '../../middleware/idempotency.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import { processClaimSchema } from './claims.validation.js';

const router = Router();

router.use(authenticate, authorize(Role.ADMIN));

router.get('/', claimsController.listClaims);
router.post(
  '/:id',
  validate(idParamSchema, 'params'),
  validate(processClaimSchema),
  idempotent(),
  claimsController.processClaim,
);

export default router;
