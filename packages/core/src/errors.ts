export type StridelyErrorCode =
  | 'CONFIG_INVALID'
  | 'PROVIDER_FAILED'
  | 'CALENDAR_WRITE_FAILED'
  | 'AUTOPILOT_STATE'
  | 'NOT_FOUND'
  | 'OUTCOME_RECORDED'

export class StridelyError extends Error {
  readonly code: StridelyErrorCode
  readonly details?: unknown

  constructor(code: StridelyErrorCode, message: string, details?: unknown) {
    super(message)
    this.name = 'StridelyError'
    this.code = code
    this.details = details
  }
}

export class ConfigError extends StridelyError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_INVALID', message, details)
    this.name = 'ConfigError'
  }
}

export class ProviderError extends StridelyError {
  constructor(provider: string, operation: string, cause: unknown) {
    super('PROVIDER_FAILED', `${provider}.${operation} failed: ${describeError(cause)}`, cause)
    this.name = 'ProviderError'
  }
}

export class CalendarWriteError extends StridelyError {
  readonly walkId: string

  constructor(walkId: string, cause: unknown) {
    super('CALENDAR_WRITE_FAILED', `Could not add walk ${walkId} to the calendar: ${describeError(cause)}`, cause)
    this.name = 'CalendarWriteError'
    this.walkId = walkId
  }
}

export class AutopilotStateError extends StridelyError {
  constructor(message: string) {
    super('AUTOPILOT_STATE', message)
    this.name = 'AutopilotStateError'
  }
}

export class NotFoundError extends StridelyError {
  constructor(message: string) {
    super('NOT_FOUND', message)
    this.name = 'NotFoundError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
