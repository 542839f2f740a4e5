// src/shared/errors.ts — Typed error taxonomy shared by bridge and gateway

/** Error codes for bridge and gateway operations */
export type BridgeErrorCode =
  | "TRANSPORT_FAILURE"
  | "UPSTREAM_CLIENT_ERROR"
  | "UPSTREAM_SERVER_ERROR"
  | "UPSTREAM_UNAVAILABLE"
  | "CIRCUIT_OPEN"
  | "VALIDATION_FAILED"
  | "UNKNOWN_TOOL"
  | "INVALID_RESPONSE"
  | "CONFIG_INVALID"
  | "CANCELLED"

/**
 * Recovery categories. Closed set: every failure site picks one when it
 * builds its BridgeError, and the recovery manager dispatches on it.
 */
export const ERROR_PATTERNS = [
  "connection_refused",
  "timeout",
  "service_unavailable",
  "circuit_breaker",
  "network_error",
  "generic",
] as const

export type ErrorPattern = (typeof ERROR_PATTERNS)[number]

export interface BridgeErrorOptions {
  pattern?: ErrorPattern
  statusCode?: number
  retryable?: boolean
  context?: Record<string, unknown>
  cause?: unknown
}

/** Typed error for all bridge/gateway operations */
export class BridgeError extends Error {
  readonly name = "BridgeError"
  readonly code: BridgeErrorCode
  readonly pattern: ErrorPattern
  readonly statusCode?: number
  readonly retryable: boolean
  readonly context: Record<string, unknown>

  constructor(code: BridgeErrorCode, message: string, opts: BridgeErrorOptions = {}) {
    super(`[bridge] ${code}: ${message}`, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.code = code
    this.pattern = opts.pattern ?? "generic"
    this.statusCode = opts.statusCode
    this.retryable = opts.retryable ?? false
    this.context = opts.context ?? {}
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      pattern: this.pattern,
      message: this.message,
      status_code: this.statusCode,
      retryable: this.retryable,
      context: this.context,
    }
  }
}

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError
}

/** Recovery category of any thrown value. Untagged errors are "generic". */
export function classifyError(err: unknown): ErrorPattern {
  return isBridgeError(err) ? err.pattern : "generic"
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Error with an explicit `name`, used as an abort reason ("AbortError", "TimeoutError"). */
export function namedError(name: string, message: string): Error {
  const err = new Error(message)
  err.name = name
  return err
}
