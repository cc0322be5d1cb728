export type HostprepErrorCode =
  | 'FATAL_PRECONDITION'
  | 'UNSUPPORTED_DISTRO'
  | 'REPORT_PERSISTENCE'
  | 'CONFIG_INVALID'
  | 'LEDGER_DUPLICATE'

export class HostprepError extends Error {
  readonly code: HostprepErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: HostprepErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'HostprepError'
    this.code = code
    this.context = context
  }
}

/** Missing privilege or host identity. The run stops before any package is touched. */
export class FatalPreconditionError extends HostprepError {
  constructor(message: string, context?: Record<string, unknown>, code: HostprepErrorCode = 'FATAL_PRECONDITION') {
    super(code, message, context)
    this.name = 'FatalPreconditionError'
  }
}

export class UnsupportedDistroError extends FatalPreconditionError {
  readonly distroId: string

  constructor(distroId: string) {
    super(`Unsupported distribution: ${distroId}`, { distroId }, 'UNSUPPORTED_DISTRO')
    this.name = 'UnsupportedDistroError'
    this.distroId = distroId
  }
}

export class ReportPersistenceError extends HostprepError {
  constructor(file: string, cause: unknown) {
    super('REPORT_PERSISTENCE', `Could not write report to ${file}: ${describeError(cause)}`, { file })
    this.name = 'ReportPersistenceError'
  }
}

export class ConfigError extends HostprepError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, context)
    this.name = 'ConfigError'
  }
}

export function isFatal(error: unknown): error is FatalPreconditionError {
  return error instanceof FatalPreconditionError
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
