// ── Roles ──
export enum Role {
  ADMIN = 'admin',
  TAILOR = 'tailor',
}

// ── Garment Category ──
export enum GarmentCategory {
  UPPER = 'upper',
  LOWER = 'lower',
  BOTH = 'both',
}

export const UPPER_BODY_MEASUREMENTS = ['chest', 'shoulder', 'sleeve_length', 'arm_hole', 'cuff', 'neck'] as const;
export const LOWER_BODY_MEASUREMENTS = [
  'waist',
  'hips',
  'thigh',
  'knee',
  'hem',
  'inseam',
  'outseam',
  'rise',
] as const;

// ── Accessory Unit ──
export enum AccessoryUnit {
  PIECES = 'pcs',
  METERS = 'meters',
  YARDS = 'yards',
  ROLLS = 'rolls',
  PACKS = 'packs',
}

// ── Order Status ──
export enum OrderStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled',
}

// Orders in these states no longer accept edits to materials or price.
export const LOCKED_ORDER_STATUSES: readonly OrderStatus[] = [
  OrderStatus.COMPLETED,
  OrderStatus.DELIVERED,
  OrderStatus.CANCELLED,
];

// ── Task Status ──
export enum TaskStatus {
  ASSIGNED = 'assigned',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  APPROVED = 'approved',
}

export const OPEN_TASK_STATUSES: readonly TaskStatus[] = [TaskStatus.ASSIGNED, TaskStatus.IN_PROGRESS];

// ── Payment ──
export enum PaymentType {
  DEPOSIT = 'deposit',
  BALANCE = 'balance',
  FULL = 'full',
}

export enum PaymentMethod {
  CASH = 'cash',
  GCASH = 'gcash',
  BANK_TRANSFER = 'bank_transfer',
}

export enum PaymentStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export enum PaymentOption {
  DEPOSIT = 'deposit',
  FULL = 'full',
}

export enum OrderPaymentStatus {
  UNPAID = 'unpaid',
  PARTIAL = 'partial',
  FULLY_PAID = 'fully_paid',
}

// ── Inventory Log ──
export enum InventoryItemType {
  FABRIC = 'fabric',
  ACCESSORY = 'accessory',
}

export enum InventoryAction {
  ADD = 'add',
  DEDUCT = 'deduct',
  ADJUST = 'adjust',
}

// ── Commission ──
export enum CommissionStatus {
  PENDING = 'pending',
  CREDITED = 'credited',
  PAID = 'paid',
}

export enum CommissionPeriod {
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  YEARLY = 'yearly',
  CUSTOM = 'custom',
}

// ── SMS Log Status ──
export enum SmsLogStatus {
  PENDING = 'pending',
  SENT = 'sent',
  FAILED = 'failed',
}

// ── Notification ──
export enum NotificationType {
  TASK_ASSIGNED = 'task_assigned',
  TASK_STARTED = 'task_started',
  TASK_COMPLETED = 'task_completed',
  TASK_APPROVED = 'task_approved',
  LOW_STOCK = 'low_stock',
  COMMISSION_CREDITED = 'commission_credited',
  GENERAL = 'general',
}

export enum NotificationPriority {
  LOW = 'low',
  NORMAL = 'normal',
  HIGH = 'high',
  URGENT = 'urgent',
}

// ── Audit Action ──
export enum AuditAction {
  // Auth
  LOGIN = 'login',
  LOGOUT = 'logout',
  LOGIN_FAILED = 'login_failed',
  PASSWORD_CHANGED = 'password_changed',

  // User
  USER_CREATED = 'user_created',
  USER_UPDATED = 'user_updated',
  USER_DISABLED = 'user_disabled',
  USER_ENABLED = 'user_enabled',

  // Customer
  CUSTOMER_CREATED = 'customer_created',
  CUSTOMER_UPDATED = 'customer_updated',
  CUSTOMER_DELETED = 'customer_deleted',

  // Catalog & inventory
  GARMENT_TYPE_CREATED = 'garment_type_created',
  GARMENT_TYPE_UPDATED = 'garment_type_updated',
  GARMENT_TYPE_DELETED = 'garment_type_deleted',
  FABRIC_CREATED = 'fabric_created',
  FABRIC_UPDATED = 'fabric_updated',
  FABRIC_DELETED = 'fabric_deleted',
  ACCESSORY_CREATED = 'accessory_created',
  ACCESSORY_UPDATED = 'accessory_updated',
  ACCESSORY_DELETED = 'accessory_deleted',
  STOCK_ADDED = 'stock_added',

  // Order
  ORDER_CREATED = 'order_created',
  ORDER_UPDATED = 'order_updated',
  ORDER_CANCELLED = 'order_cancelled',
  ORDER_CLAIMED = 'order_claimed',

  // Task
  TASK_ASSIGNED = 'task_assigned',
  TASK_STATUS_CHANGED = 'task_status_changed',
  TASK_APPROVED = 'task_approved',

  // Payment
  PAYMENT_RECORDED = 'payment_recorded',

  // Commission
  COMMISSION_CREDITED = 'commission_credited',
  COMMISSION_PAID = 'commission_paid',
}
