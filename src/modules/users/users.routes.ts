import { Router } from 'express';
import * as usersController from './users.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import { createUserSchema, updateUserSchema } from './users.validation.js';

const router = Router();

router.use(authenticate, authorize(Role.ADMIN));

// ── Tailor lookup (task assignment, garment default tailor) ──
router.get('/tailors', usersController.listTailors);

// ── Admin User Management ──
router.post('/', validate(createUserSchema), usersController.createUser);
router.get('/', usersController.listUsers);
router.get('/:id', validate(idParamSchema, 'params'), usersController.getUser);
router.patch('/:id', validate(idParamSchema, 'params'), validate(updateUserSchema), usersController.updateUser);
router.post('/:id/toggle-active', validate(idParamSchema, 'params'), usersController.toggleUserActive);

export default router;
