// Standardized error handling utilities
// Route-level errors map to HTTP responses; domain errors describe model and transport failures

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
  VALIDATION_ERROR = 'validation_error',
  MODEL_ENDPOINT_ERROR = 'model_endpoint_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static conflict(message: string = 'Resource already exists', details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static badGateway(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_ENDPOINT_ERROR, message, 502, details);
  }

  static unavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

/**
 * The model endpoint was unreachable, rejected the request, or answered with
 * an envelope we could not read. Ends the current run.
 */
export class ModelEndpointError extends Error {
  constructor(
    message: string,
    public status?: number,
    public toolsUnsupported: boolean = false,
  ) {
    super(message);
    this.name = 'ModelEndpointError';
  }
}

/** SSH-level failure: authentication, unreachable host, timeout, missing client. */
export class TransportError extends Error {
  constructor(message: string, public timedOut: boolean = false) {
    super(message);
    this.name = 'TransportError';
  }
}

/** Tool registry misconfiguration. Thrown while wiring the app, never mid-run. */
export class ToolConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED && isRetryDetails(error.details)) {
    response.retry_after_seconds = error.details.retryAfter;
  }

  return response;
}

function isRetryDetails(details: unknown): details is { retryAfter: number } {
  return (
    typeof details === 'object' &&
    details !== null &&
    'retryAfter' in details &&
    typeof details.retryAfter === 'number'
  );
}
