import { Customer, Order, AuditLog } from '../../models/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { AuditAction } from '../../utils/constants.js';
import { escapeRegex, paginate, paginationMeta } from '../../utils/helpers.js';
import type { CreateCustomerInput, UpdateCustomerInput, ListCustomersQuery } from './customers.validation.js';

function searchFilter(term?: string) {
  if (!term) return {};
  const pattern = { $regex: escapeRegex(term), $options: 'i' };
  return { $or: [{ name: pattern }, { contactNumber: pattern }] };
}

export async function createCustomer(input: CreateCustomerInput, actorId: string, ip?: string, ua?: string) {
  const customer = await Customer.create(input);

  await AuditLog.create({
    action: AuditAction.CUSTOMER_CREATED,
    actorId,
    targetType: 'customer',
    targetId: customer._id,
    details: { name: customer.name },
    ipAddress: ip,
    userAgent: ua,
  });

  return customer;
}

export async function listCustomers(query: ListCustomersQuery) {
  const filter = searchFilter(query.search);
  const { skip, limit } = paginate(query.page, query.limit);

  const [items, total] = await Promise.all([
    Customer.find(filter).sort({ createdAt: -1 }).skip(skip).limit(limit),
    Customer.countDocuments(filter),
  ]);

  return { items, ...paginationMeta(query.page, query.limit, total) };
}

/** Autocomplete for order intake. */
export async function searchCustomers(term: string) {
  if (!term) return [];
  const customers = await Customer.find(searchFilter(term)).sort({ name: 1 }).limit(10);
  return customers.map((c) => ({
    id: c._id,
    name: c.name,
    contactNumber: c.contactNumber,
    email: c.email ?? '',
  }));
}

export async function getCustomer(customerId: string) {
  const customer = await Customer.findById(customerId);
  if (!customer) throw AppError.notFound('Customer not found');

  const recentOrders = await Order.find({ customerId: customer._id })
    .populate('garmentTypeId', 'name')
    .sort({ createdAt: -1 })
    .limit(10);

  return { customer, recentOrders };
}

export async function updateCustomer(
  customerId: string,
  input: UpdateCustomerInput,
  actorId: string,
  ip?: string,
  ua?: string,
) {
  const customer = await Customer.findById(customerId);
  if (!customer) throw AppError.notFound('Customer not found');

  customer.set(input);
  await customer.save();

  await AuditLog.create({
    action: AuditAction.CUSTOMER_UPDATED,
    actorId,
    targetType: 'customer',
    targetId: customer._id,
    details: { changes: Object.keys(input) },
    ipAddress: ip,
    userAgent: ua,
  });

  return customer;
}

export async function deleteCustomer(customerId: string, actorId: string, ip?: string, ua?: string) {
  const customer = await Customer.findById(customerId);
  if (!customer) throw AppError.notFound('Customer not found');

  const orderCount = await Order.countDocuments({ customerId: customer._id });
  if (orderCount > 0) {
    throw AppError.conflict('Cannot delete a customer with existing orders', ErrorCode.HAS_DEPENDENTS, {
      orderCount,
    });
  }

  await customer.deleteOne();

  await AuditLog.create({
    action: AuditAction.CUSTOMER_DELETED,
    actorId,
    targetType: 'customer',
    targetId: customer._id,
    details: { name: customer.name },
    ipAddress: ip,
    userAgent: ua,
  });

  return { message: 'Customer deleted' };
}
