import { HttpStatus } from '@nestjs/common';

export enum DomainErrorKind {
  NOT_FOUND = 'NotFound',
  INVALID_TRANSITION = 'InvalidTransition',
  CANNOT_MODIFY = 'CannotModify',
  NOT_EDITABLE = 'NotEditable',
  CANNOT_REVIEW = 'CannotReview',
  ALREADY_EXISTS = 'AlreadyExists',
  ALREADY_USED = 'AlreadyUsed',
  ALREADY_CONSUMED = 'AlreadyConsumed',
  EXPIRED = 'Expired',
  INVALID = 'Invalid',
  VALIDATION_FAILED = 'ValidationFailed',
  UNAUTHENTICATED = 'Unauthenticated',
  FORBIDDEN = 'Forbidden',
  RATE_LIMIT_EXCEEDED = 'RateLimitExceeded',
  INTERNAL = 'Internal',
}

export const DOMAIN_ERROR_STATUS: Record<DomainErrorKind, HttpStatus> = {
  [DomainErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [DomainErrorKind.INVALID_TRANSITION]: HttpStatus.CONFLICT,
  [DomainErrorKind.CANNOT_MODIFY]: HttpStatus.CONFLICT,
  [DomainErrorKind.NOT_EDITABLE]: HttpStatus.CONFLICT,
  [DomainErrorKind.CANNOT_REVIEW]: HttpStatus.CONFLICT,
  [DomainErrorKind.ALREADY_EXISTS]: HttpStatus.CONFLICT,
  [DomainErrorKind.ALREADY_USED]: HttpStatus.CONFLICT,
  [DomainErrorKind.ALREADY_CONSUMED]: HttpStatus.CONFLICT,
  [DomainErrorKind.EXPIRED]: HttpStatus.GONE,
  [DomainErrorKind.INVALID]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.VALIDATION_FAILED]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.UNAUTHENTICATED]: HttpStatus.UNAUTHORIZED,
  [DomainErrorKind.FORBIDDEN]: HttpStatus.FORBIDDEN,
  [DomainErrorKind.RATE_LIMIT_EXCEEDED]: HttpStatus.TOO_MANY_REQUESTS,
  [DomainErrorKind.INTERNAL]: HttpStatus.INTERNAL_SERVER_ERROR,
};

const DEFAULT_CODES: Record<DomainErrorKind, string> = {
  [DomainErrorKind.NOT_FOUND]: 'not_found',
  [DomainErrorKind.INVALID_TRANSITION]: 'invalid_transition',
  [DomainErrorKind.CANNOT_MODIFY]: 'cannot_modify',
  [DomainErrorKind.NOT_EDITABLE]: 'not_editable',
  [DomainErrorKind.CANNOT_REVIEW]: 'cannot_review',
  [DomainErrorKind.ALREADY_EXISTS]: 'already_exists',
  [DomainErrorKind.ALREADY_USED]: 'already_used',
  [DomainErrorKind.ALREADY_CONSUMED]: 'already_consumed',
  [DomainErrorKind.EXPIRED]: 'expired',
  [DomainErrorKind.INVALID]: 'invalid',
  [DomainErrorKind.VALIDATION_FAILED]: 'validation_failed',
  [DomainErrorKind.UNAUTHENTICATED]: 'authentication_failed',
  [DomainErrorKind.FORBIDDEN]: 'forbidden',
  [DomainErrorKind.RATE_LIMIT_EXCEEDED]: 'rate_limit_exceeded',
  [DomainErrorKind.INTERNAL]: 'internal_error',
};

/**
 * Typed failure raised by every service. The global exception filter maps
 * `kind` to an HTTP status and sends `code` as the machine-readable error.
 */
export class DomainError extends Error {
  readonly code: string;

  constructor(
    readonly kind: DomainErrorKind,
    message: string,
    code?: string,
  ) {
    super(message);
    this.name = 'DomainError';
    this.code = code ?? DEFAULT_CODES[kind];
  }

  get status(): HttpStatus {
    return DOMAIN_ERROR_STATUS[this.kind];
  }

  static notFound(resource: string) {
    return new DomainError(DomainErrorKind.NOT_FOUND, `${resource} not found`);
  }

  static invalidTransition(message: string) {
    return new DomainError(DomainErrorKind.INVALID_TRANSITION, message);
  }

  static cannotModify(message: string) {
    return new DomainError(DomainErrorKind.CANNOT_MODIFY, message);
  }

  static notEditable(message: string) {
    return new DomainError(DomainErrorKind.NOT_EDITABLE, message);
  }

  static cannotReview(action: string) {
    return new DomainError(DomainErrorKind.CANNOT_REVIEW, `cannot ${action} this requirement`);
  }

  static alreadyExists(message: string) {
    return new DomainError(DomainErrorKind.ALREADY_EXISTS, message);
  }

  static validation(message: string, code?: string) {
    return new DomainError(DomainErrorKind.VALIDATION_FAILED, message, code);
  }

  static unauthenticated(message: string) {
    return new DomainError(DomainErrorKind.UNAUTHENTICATED, message);
  }

  static forbidden(message: string) {
    return new DomainError(DomainErrorKind.FORBIDDEN, message);
  }
}
