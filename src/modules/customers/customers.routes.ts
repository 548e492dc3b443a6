import { Router } from 'express';
import * as customersController from './customers.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { Role } from '../../utils/constants.js';
import { idParamSchema } from '../../utils/validation.js';
import { createCustomerSchema, updateCustomerSchema } from './customers.validation.js';

const router = Router();

router.use(authenticate);

// Autocomplete is open to all staff
router.get('/search', customersController.searchCustomers);

router.use(authorize(Role.ADMIN));

router.get('/', customersController.listCustomers);
router.post('/', validate(createCustomerSchema), customersController.createCustomer);
router.get('/:id', validate(idParamSchema, 'params'), customersController.getCustomer);
router.patch('/:id', validate(idParamSchema, 'params'), validate(updateCustomerSchema), customersController.updateCustomer);
router.delete('/:id', validate(idParamSchema, 'params'), customersController.deleteCustomer);

export default router;
