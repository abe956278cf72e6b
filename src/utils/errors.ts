export type RegistryErrorKind = 'NotFound' | 'InvalidState';

/**
 * Failure raised by the activity registry. Both kinds are terminal: the
 * registry is left exactly as it was before the failed call.
 */
export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.kind = kind;
  }
}

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
}

export type ErrorDetail = string | ValidationIssue[];

/**
 * Error carrying the HTTP status and the `detail` payload sent to the client.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly detail: ErrorDetail;

  constructor(detail: ErrorDetail, statusCode: number = 500, code: string = 'INTERNAL_ERROR') {
    super(typeof detail === 'string' ? detail : 'Request validation failed');
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.detail = detail;
  }
}

const REGISTRY_STATUS: Record<RegistryErrorKind, { statusCode: number; code: string }> = {
  NotFound: { statusCode: 404, code: 'NOT_FOUND' },
  InvalidState: { statusCode: 400, code: 'INVALID_STATE' }
};

export const errors = {
  notFound: (detail: string = 'Not Found') => new ApiError(detail, 404, 'NOT_FOUND'),
  unprocessable: (issues: ValidationIssue[]) => new ApiError(issues, 422, 'VALIDATION_ERROR'),
  internal: (detail: string = 'Internal server error') => new ApiError(detail, 500, 'INTERNAL_ERROR'),
  fromRegistry: (error: RegistryError) => {
    const { statusCode, code } = REGISTRY_STATUS[error.kind];
    return new ApiError(error.message, statusCode, code);
  }
};
