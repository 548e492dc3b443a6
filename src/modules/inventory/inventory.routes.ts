import { Router } from 'express';
import * as inventoryController from './inventory.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import {
  addStockSchema,
  createAccessorySchema,
  createFabricSchema,
  updateAccessorySchema,
  updateFabricSchema,
} from './inventory.validation.js';

const router = Router();

router.use(authenticate);

// Open to tailors as well: order forms check fabric before submitting
router.get('/stock-check', inventoryController.checkFabricStock);

router.use(authorize(Role.ADMIN));

router.get('/', inventoryController.getDashboard);
router.get('/low-stock', inventoryController.getLowStock);
router.get('/logs', inventoryController.listLogs);

// ── Fabrics ──
router.get('/fabrics', inventoryController.listFabrics);
router.post('/fabrics', validate(createFabricSchema), inventoryController.createFabric);
router.get('/fabrics/:id', validate(idParamSchema, 'params'), inventoryController.getFabric);
router.patch(
  '/fabrics/:id',
  validate(idParamSchema, 'params'),
  validate(updateFabricSchema),
  inventoryController.updateFabric,
);
router.post(
  '/fabrics/:id/stock',
  validate(idParamSchema, 'params'),
  validate(addStockSchema),
  inventoryController.addFabricStock,
);
router.delete('/fabrics/:id', validate(idParamSchema, 'params'), inventoryController.deleteFabric);

// ── Accessories ──
router.get('/accessories', inventoryController.listAccessories);
router.post('/accessories', validate(createAccessorySchema), inventoryController.createAccessory);
router.get('/accessories/:id', validate(idParamSchema, 'params'), inventoryController.getAccessory);
router.patch(
  '/accessories/:id',
  validate(idParamSchema, 'params'),
  validate(updateAccessorySchema),
  inventoryController.updateAccessory,
);
router.post(
  '/accessories/:id/stock',
  validate(idParamSchema, 'params'),
  validate(addStockSchema),
  inventoryController.addAccessoryStock,
);
router.delete('/accessories/:id', validate(idParamSchema, 'params'), inventoryController.deleteAccessory);

export default router;
