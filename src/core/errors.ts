/**
 * Error definitions for hookstage
 * Provides structured error hierarchy for all hook orchestration operations
 */

/** Base error class for all hookstage errors */
export class HookstageError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'HookstageError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HookstageError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a hook annotation names a phase outside the closed set */
export class UnrecognizedPhaseError extends HookstageError {
  constructor(value: string, context: Record<string, unknown> = {}) {
    super(`Unrecognized hook phase: "${value}"`, 'UNRECOGNIZED_PHASE', {
      value,
      ...context,
    })
    this.name = 'UnrecognizedPhaseError'
  }
}

/** Error thrown when a release operation is not one of install/upgrade/delete/rollback */
export class UnknownOperationError extends HookstageError {
  constructor(operation: string) {
    super(`Unknown release operation: "${operation}"`, 'UNKNOWN_OPERATION', {
      operation,
    })
    this.name = 'UnknownOperationError'
  }
}

/** Error thrown when the apply mechanism rejects a hook resource */
export class SubmissionFailedError extends HookstageError {
  constructor(hook: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Hook ${hook} was rejected by the apply mechanism: ${reason}`, 'SUBMISSION_FAILED', {
      hook,
      reason,
      ...context,
    })
    this.name = 'SubmissionFailedError'
  }
}

/** Error thrown when a run-to-completion hook does not finish before its deadline */
export class ReadinessTimeoutError extends HookstageError {
  public readonly cancelled: boolean

  constructor(hook: string, timeoutMs: number, cancelled = false) {
    super(
      cancelled
        ? `Hook ${hook} was cancelled before reaching a terminal state`
        : `Hook ${hook} did not reach a terminal state within ${String(timeoutMs)}ms`,
      'READINESS_TIMEOUT',
      { hook, timeoutMs, cancelled }
    )
    this.name = 'ReadinessTimeoutError'
    this.cancelled = cancelled
  }
}

/** Error thrown when a run-to-completion hook reports terminal failure */
export class HookFailedError extends HookstageError {
  constructor(hook: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Hook ${hook} failed: ${reason}`, 'HOOK_FAILED', { hook, reason, ...context })
    this.name = 'HookFailedError'
  }
}

/** Error raised when a hook in a phase failed and the remaining hooks were skipped */
export class PhaseAbortedError extends HookstageError {
  constructor(
    phase: string,
    hook: string,
    cause: HookstageError,
    skipped: string[] = []
  ) {
    super(`Phase ${phase} aborted: ${cause.message}`, 'PHASE_ABORTED', {
      phase,
      hook,
      skipped,
      reason: cause.code,
    }, { cause })
    this.name = 'PhaseAbortedError'
  }
}

/** Terminating error for a release operation, naming the operation, phase and hook */
export class OperationFailedError extends HookstageError {
  constructor(
    operation: string,
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(`${operation} failed: ${message}`, 'OPERATION_FAILED', { operation, ...context }, { cause })
    this.name = 'OperationFailedError'
  }
}

/** Error thrown when the apply mechanism cannot complete a call (e.g. a status read) */
export class ApplyError extends HookstageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'APPLY_ERROR', context)
    this.name = 'ApplyError'
  }
}

/** Error thrown when rendered manifest content cannot be parsed */
export class ManifestParseError extends HookstageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MANIFEST_PARSE_ERROR', context)
    this.name = 'ManifestParseError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends HookstageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends HookstageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}
