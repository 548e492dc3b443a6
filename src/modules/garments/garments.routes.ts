import { Router } from 'express';
import { z } from 'zod';
import * as garmentsController from './garments.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema, objectIdSchema } from '../../utils/validation.js';
import { createGarmentTypeSchema, updateGarmentTypeSchema, garmentAccessorySchema } from './garments.validation.js';

const router = Router();

router.use(authenticate, authorize(Role.ADMIN));

const accessoryParamSchema = z.object({ id: objectIdSchema, accessoryId: objectIdSchema });

router.get('/', garmentsController.listGarmentTypes);
router.post('/', validate(createGarmentTypeSchema), garmentsController.createGarmentType);
router.get('/:id', validate(idParamSchema, 'params'), garmentsController.getGarmentType);
router.get('/:id/requirements', validate(idParamSchema, 'params'), garmentsController.getGarmentRequirements);
router.patch(
  '/:id',
  validate(idParamSchema, 'params'),
  validate(updateGarmentTypeSchema),
  garmentsController.updateGarmentType,
);
router.delete('/:id', validate(idParamSchema, 'params'), garmentsController.deleteGarmentType);

// ── Accessory requirements ──
router.put(
  '/:id/accessories',
  validate(idParamSchema, 'params'),
  validate(garmentAccessorySchema),
  garmentsController.upsertGarmentAccessory,
);
router.delete(
  '/:id/accessories/:accessoryId',
  validate(accessoryParamSchema, 'params'),
  garmentsController.removeGarmentAccessory,
);

export default router;
