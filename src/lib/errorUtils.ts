/**
 * Error handling utilities
 *
 * Engine error types plus consistent message extraction and logging.
 */

/**
 * Machine-readable error codes raised by the decision engine.
 */
export type EngineErrorCode =
  | 'INVALID_STATE'
  | 'SAMPLING_EXHAUSTED'
  | 'STRATEGY_UNAVAILABLE'
  | 'SEARCH_CANCELLED'
  | 'INVALID_CONFIG'

/**
 * Base class for every error the engine raises on purpose.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A caller recorded a result that the tracker cannot accept
 * (resolved cell, out-of-bounds cell, impossible sunk report).
 */
export class InvalidStateError extends EngineError {
  constructor(message: string) {
    super('INVALID_STATE', message)
  }
}

/**
 * No placement consistent with the recorded results was found within the
 * attempt cap. The recorded results contradict each other.
 */
export class SamplingExhaustedError extends EngineError {
  readonly attempts: number

  constructor(attempts: number) {
    super(
      'SAMPLING_EXHAUSTED',
      `No placement consistent with the board knowledge after ${attempts} attempts`
    )
    this.attempts = attempts
  }
}

/**
 * The learned policy slot is empty, not loaded, or returned an unusable target.
 */
export class StrategyUnavailableError extends EngineError {
  constructor(message: string) {
    super('STRATEGY_UNAVAILABLE', message)
  }
}

/**
 * The decision was aborted through its AbortSignal.
 */
export class SearchCancelledError extends EngineError {
  readonly simulations: number

  constructor(simulations: number) {
    super('SEARCH_CANCELLED', `Search cancelled after ${simulations} simulations`)
    this.simulations = simulations
  }
}

/**
 * Engine configuration failed validation.
 */
export class ConfigError extends EngineError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid engine configuration: ${issues.join('; ')}`)
    this.issues = issues
  }
}

/**
 * Type guard for engine errors, optionally of one specific code.
 */
export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code)
}

/**
 * Extract a readable error message from an unknown error value.
 * Handles Error objects, strings, and objects with message/error properties.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted (default: 'An error occurred')
 *
 * @example
 * try {
 *   await store.save(table)
 * } catch (err) {
 *   logError('placement-model', err)
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object') {
    if ('error' in err && typeof err.error === 'string') {
      return err.error
    }
    if ('message' in err && typeof err.message === 'string') {
      return err.message
    }
  }

  return fallback
}

/**
 * Log an error with context for debugging.
 *
 * @param context - A description of where/what the error occurred
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  console.error(`[${context}]`, message, err)
}

/**
 * Log a recoverable problem with context.
 */
export function logWarning(context: string, message: string): void {
  console.warn(`[${context}]`, message)
}
