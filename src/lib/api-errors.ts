// ---------------------------------------------------------------------------
// Standard API error helpers
// ---------------------------------------------------------------------------
// Fastify's error handler checks `error.statusCode` to determine the HTTP
// response code. The topic services throw these directly, so the same error
// carries the taxonomy code for library callers and the status for HTTP.
// ---------------------------------------------------------------------------

export type ApiErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNAUTHENTICATED'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONCURRENCY_CONFLICT'
  | 'VALIDATION_FAILURE'
  | 'RATE_LIMITED'
  | 'UPSTREAM_UNAVAILABLE'

export type ApiErrorDetails = Record<string, string | number | number[] | string[]>

/**
 * Base API error with an HTTP status code.
 * Fastify uses `statusCode` on thrown errors to set the response status.
 */
export class ApiError extends Error {
  readonly statusCode: number
  readonly code: ApiErrorCode
  readonly details: ApiErrorDetails | undefined

  constructor(statusCode: number, code: ApiErrorCode, message: string, details?: ApiErrorDetails) {
    super(message)
    this.statusCode = statusCode
    this.code = code
    this.details = details
    this.name = 'ApiError'
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError
}

/**
 * Create a 400 error for malformed or foreign input.
 *
 * @param message - Human-readable description of the bad argument.
 */
export function invalidArgument(message: string, details?: ApiErrorDetails): ApiError {
  return new ApiError(400, 'INVALID_ARGUMENT', message, details)
}

/** Create a 401 error for a missing, malformed or expired access token. */
export function unauthenticated(message: string): ApiError {
  return new ApiError(401, 'UNAUTHENTICATED', message)
}

/**
 * Create a 403 Forbidden error.
 *
 * @param message - Human-readable reason for the denial.
 */
export function permissionDenied(message: string): ApiError {
  return new ApiError(403, 'PERMISSION_DENIED', message)
}

/**
 * Create a 404 Not Found error.
 *
 * @param message - Human-readable description of what was not found.
 */
export function notFound(message: string): ApiError {
  return new ApiError(404, 'NOT_FOUND', message)
}

/**
 * Create a 409 error for a write that lost a race with another actor.
 * Nothing of the failed operation has been applied.
 */
export function concurrencyConflict(message: string, details?: ApiErrorDetails): ApiError {
  return new ApiError(409, 'CONCURRENCY_CONFLICT', message, details)
}

/**
 * Create a 422 error for input that is well-formed but breaks a rule.
 */
export function validationFailure(message: string, details?: ApiErrorDetails): ApiError {
  return new ApiError(422, 'VALIDATION_FAILURE', message, details)
}

/**
 * Create a 429 Too Many Requests error.
 *
 * @param message - Human-readable description of the rate limit violation.
 */
export function tooManyRequests(message: string): ApiError {
  return new ApiError(429, 'RATE_LIMITED', message)
}

/** Create a 502 error when a backing service (session store) cannot answer. */
export function upstreamUnavailable(message: string): ApiError {
  return new ApiError(502, 'UPSTREAM_UNAVAILABLE', message)
}
