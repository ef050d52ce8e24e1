// Standardized error handling utilities
// AppError carries HTTP mapping; the subclasses below classify failures inside a chat turn

export enum ErrorCode {
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  PROVIDER_FAILURE = 'provider_failure',
  TOOL_DISPATCH_FAILURE = 'tool_dispatch_failure',
  MALFORMED_TOOL_ARGUMENTS = 'malformed_tool_arguments',
  STORE_QUERY_FAILURE = 'store_query_failure',
}

/** The only failure text a client ever sees. */
export const GENERIC_ERROR_MESSAGE = 'An error occurred while processing your request';

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

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

/**
 * A completion or embedding backend was unreachable or rejected the request.
 * Surfaced to the caller, never retried here.
 */
export class ProviderFailure extends AppError {
  constructor(
    public provider: string,
    message: string,
    options?: { cause?: unknown; code?: ErrorCode }
  ) {
    super(options?.code ?? ErrorCode.PROVIDER_FAILURE, message, 502);
    this.name = 'ProviderFailure';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static wrap(provider: string, error: unknown): ProviderFailure {
    if (error instanceof ProviderFailure) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderFailure(provider, `${provider} request failed: ${message}`, { cause: error });
  }
}

/** The similarity store failed a query. Travels up as a provider-class failure. */
export class StoreQueryFailure extends ProviderFailure {
  constructor(
    public partition: string,
    message: string,
    cause?: unknown
  ) {
    super('vector-store', message, { cause, code: ErrorCode.STORE_QUERY_FAILURE });
    this.name = 'StoreQueryFailure';
  }
}

/** One tool invocation raised. The turn continues as if it returned nothing. */
export class ToolDispatchFailure extends AppError {
  constructor(
    public operation: string,
    message: string,
    options?: { cause?: unknown; code?: ErrorCode; details?: unknown }
  ) {
    super(options?.code ?? ErrorCode.TOOL_DISPATCH_FAILURE, message, 500, options?.details);
    this.name = 'ToolDispatchFailure';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** The provider emitted arguments that are not JSON or do not fit the operation's schema. */
export class MalformedToolArguments extends ToolDispatchFailure {
  constructor(operation: string, message: string, details?: unknown) {
    super(operation, message, { code: ErrorCode.MALFORMED_TOOL_ARGUMENTS, details });
    this.name = 'MalformedToolArguments';
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
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

  return response;
}
