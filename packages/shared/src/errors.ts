import { type CareError, type CareErrorKind, publicRedemptionError } from '@careline/domain';

export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
};

const CARE_ERROR_CODES: Record<CareErrorKind, ErrorCode> = {
  INVALID_CODE: ErrorCode.VALIDATION,
  EXPIRED_CODE: ErrorCode.VALIDATION,
  ALREADY_REDEEMED: ErrorCode.CONFLICT,
  LOCKED_OUT: ErrorCode.RATE_LIMITED,
  COMMUNITY_MISMATCH: ErrorCode.FORBIDDEN,
  SCOPE_MISMATCH: ErrorCode.FORBIDDEN,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  ALREADY_CLOSED: ErrorCode.CONFLICT,
  ISSUANCE_COLLISION: ErrorCode.CONFLICT,
  NOT_TERMINAL: ErrorCode.CONFLICT,
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.safeMeta = safeMeta;
  }

  /** For callers entitled to the full reason, e.g. the owning caregiver. */
  static fromCareError(error: CareError): AppError {
    return new AppError(CARE_ERROR_CODES[error.kind], error.message, { reason: error.kind });
  }

  /** Unauthenticated redemption only ever learns "not usable" or "locked out". */
  static fromRedemptionFailure(kind: CareErrorKind): AppError {
    if (publicRedemptionError(kind) === 'LOCKED_OUT') {
      return new AppError(ErrorCode.RATE_LIMITED, 'Too many attempts, try again later', { reason: 'LOCKED_OUT' });
    }
    return new AppError(ErrorCode.VALIDATION, 'This code cannot be used', { reason: 'CODE_NOT_USABLE' });
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}
