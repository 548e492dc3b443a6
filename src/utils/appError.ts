// ── Error Codes ──
export enum ErrorCode {
  // Auth
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_INVALID = 'TOKEN_INVALID',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  ACCOUNT_DISABLED = 'ACCOUNT_DISABLED',

  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',

  // Resources
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  HAS_DEPENDENTS = 'HAS_DEPENDENTS',

  // State machine
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  ORDER_LOCKED = 'ORDER_LOCKED',

  // Inventory
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',

  // Payment
  DEPOSIT_REQUIRED = 'DEPOSIT_REQUIRED',
  ORDER_FULLY_PAID = 'ORDER_FULLY_PAID',
  IDEMPOTENCY_CONFLICT = 'IDEMPOTENCY_CONFLICT',

  // Rate limiting
  RATE_LIMITED = 'RATE_LIMITED',

  // Server
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code = ErrorCode.VALIDATION_ERROR, details?: Record<string, unknown>) {
    return new AppError(message, 400, code, details);
  }

  static unauthorized(message = 'Unauthorized', code = ErrorCode.UNAUTHORIZED) {
    return new AppError(message, 401, code);
  }

  static forbidden(message = 'Forbidden', code = ErrorCode.FORBIDDEN) {
    return new AppError(message, 403, code);
  }

  static notFound(message = 'Resource not found') {
    return new AppError(message, 404, ErrorCode.NOT_FOUND);
  }

  static conflict(message: string, code = ErrorCode.CONFLICT, details?: Record<string, unknown>) {
    return new AppError(message, 409, code, details);
  }

  static internal(message = 'Internal server error') {
    return new AppError(message, 500, ErrorCode.INTERNAL_ERROR, undefined, false);
  }
}
