// ── Error Codes ──
export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',

  // Resources
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',

  // Scheduling
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  UNKNOWN_SLOT = 'UNKNOWN_SLOT',
  EMPTY_REQUEST_POOL = 'EMPTY_REQUEST_POOL',
  SLOT_UNAVAILABLE = 'SLOT_UNAVAILABLE',
  GUARDIAN_CONFLICT = 'GUARDIAN_CONFLICT',
  CYCLE_CLOSED = 'CYCLE_CLOSED',

  // Persistence
  COMMIT_FAILED = 'COMMIT_FAILED',

  // State machine
  INVALID_TRANSITION = 'INVALID_TRANSITION',

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

  static notFound(message = 'Resource not found', code = ErrorCode.NOT_FOUND, details?: Record<string, unknown>) {
    return new AppError(message, 404, code, details);
  }

  static conflict(message: string, code = ErrorCode.CONFLICT, details?: Record<string, unknown>) {
    return new AppError(message, 409, code, details);
  }

  static unprocessable(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    return new AppError(message, 422, code, details);
  }

  static internal(message = 'Internal server error') {
    return new AppError(message, 500, ErrorCode.INTERNAL_ERROR, undefined, false);
  }

  static unavailable(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    return new AppError(message, 503, code, details);
  }

  // ── Scheduling shorthands ──

  static capacityExceeded(slotId: string) {
    return AppError.conflict(`Slot ${slotId} is at capacity`, ErrorCode.CAPACITY_EXCEEDED, { slotId });
  }

  static unknownSlot(slotId: string) {
    return AppError.notFound(`Slot ${slotId} is not registered`, ErrorCode.UNKNOWN_SLOT, { slotId });
  }

  static commitFailed(message: string, details?: Record<string, unknown>) {
    return AppError.unavailable(message, ErrorCode.COMMIT_FAILED, details);
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}
