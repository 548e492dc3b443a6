import { Router } from 'express';
import * as tasksController from './tasks.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import { assignTaskSchema, updateTaskNotesSchema, updateTaskStatusSchema } from './tasks.validation.js';

const router = Router();

router.use(authenticate);

// Tailors see and update only their own tasks; the service enforces ownership
router.get('/', tasksController.listTasks);
router.get('/:id', validate(idParamSchema, 'params'), tasksController.getTask);
router.patch(
  '/:id/status',
  validate(idParamSchema, 'params'),
  validate(updateTaskStatusSchema),
  tasksController.updateTaskStatus,
);
router.patch(
  '/:id/notes',
  validate(idParamSchema, 'params'),
  validate(updateTaskNotesSchema),
  tasksController.updateTaskNotes,
);

// ── Admin ──
router.post('/assign', authorize(Role.ADMIN), validate(assignTaskSchema), tasksController.assignTask);
router.post('/:id/approve', authorize(Role.ADMIN), validate(idParamSchema, 'params'), tasksController.approveTask);

export default router;
