// ============================================================================
// Error Types
// ============================================================================

export const SafeClientErrorCode = {
  // connection refused, timeout, DNS; the fetch call itself rejected
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  // HTTP status >= 400 other than 422
  SERVER_STATUS: 'SERVER_STATUS',
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  API_ERROR: 'API_ERROR',
  NO_SIGNER: 'NO_SIGNER',
  WRONG_SIGNER: 'WRONG_SIGNER',
  UNKNOWN_SERVICE: 'UNKNOWN_SERVICE',
  MISSING_TO: 'MISSING_TO',
  INVALID_INPUT: 'INVALID_INPUT',
} as const
export type SafeClientErrorCode =
  (typeof SafeClientErrorCode)[keyof typeof SafeClientErrorCode]

export class SafeClientError extends Error {
  public constructor(
    message: string,
    public readonly code: SafeClientErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SafeClientError'
  }
}

/**
 * Structured error reported by the service: `{ code, message, arguments }`
 */
export class SafeApiError extends SafeClientError {
  public constructor(
    public readonly apiCode: number,
    public readonly apiMessage: string | null,
    public readonly apiArguments: unknown[]
  ) {
    super(
      `API usage error. Code: ${apiCode}, Message: "${apiMessage ?? ''}"`,
      SafeClientErrorCode.API_ERROR,
      { apiCode, apiMessage, apiArguments }
    )
    this.name = 'SafeApiError'
  }
}

/**
 * Raised when the signing capability fails or refuses to sign. Kept apart
 * from SafeClientError so a declined signature is never mistaken for a
 * service problem.
 */
export class SafeSignerError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SafeSignerError'
  }
}

export const isSafeClientError = (
  error: unknown,
  code?: SafeClientErrorCode
): error is SafeClientError =>
  error instanceof SafeClientError && (code === undefined || error.code === code)

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
