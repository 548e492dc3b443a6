import { Router } from 'express';
import * as commissionsController from './commissions.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { markPaidSchema } from './commissions.validation.js';

const router = Router();

router.use(authenticate);

// Tailors get their own figures; admins may pass ?tailorId to the PDF and history
router.get('/dashboard', authorize(Role.TAILOR), commissionsController.getDashboard);
router.get('/history', commissionsController.listHistory);
router.get('/report/tailor', commissionsController.getTailorReportPdf);

// ── Admin (?type=weekly|monthly|yearly|custom&format=json|pdf) ──
router.get('/report', authorize(Role.ADMIN), commissionsController.getAdminReport);
router.get('/report/garments', authorize(Role.ADMIN), commissionsController.getGarmentReport);
router.get('/report/performance', authorize(Role.ADMIN), commissionsController.getPerformanceReport);
router.post('/mark-paid', authorize(Role.ADMIN), validate(markPaidSchema), commissionsController.markPaid);

export default router;
