// ── Barrel Export for all models ──
export { User, type IUser, fullName } from './User.js';
export { Customer, type ICustomer } from './Customer.js';
export { Fabric, type IFabric } from './Fabric.js';
export { Accessory, type IAccessory } from './Accessory.js';
export { GarmentType, type IGarmentType, type IGarmentAccessory } from './GarmentType.js';
export { Order, type IOrder, type IOrderAccessory } from './Order.js';
export { TailoringTask, type ITailoringTask } from './TailoringTask.js';
export { Payment, type IPayment } from './Payment.js';
export { TailorCommission, type ITailorCommission } from './TailorCommission.js';
export { InventoryLog, type IInventoryLog } from './InventoryLog.js';
export { SmsLog, type ISmsLog } from './SmsLog.js';
export { AuditLog, type IAuditLog } from './AuditLog.js';
export { Notification, type INotification } from './Notification.js';
export { IdempotencyKey, type IIdempotencyKey } from './IdempotencyKey.js';
