/**
 * Error handling utilities
 *
 * Provides consistent error message extraction and logging for the agent.
 * Diagnostics always go to stderr: stdout carries protocol replies only.
 */

/**
 * Raised when the game manager sends a line the agent cannot understand.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly line: string | null = null
  ) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * Extract an error message from an unknown error value.
 * Handles Error objects, strings, and objects with message/error properties.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted (default: 'An error occurred')
 *
 * @example
 * try {
 *   await runAgent(io)
 * } catch (err) {
 *   console.error(getErrorMessage(err))
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
 * Check if an error came from a malformed protocol line.
 */
export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError
}

/**
 * Log an error with context for debugging.
 *
 * @param context - A description of where/what the error occurred
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  if (isProtocolError(err) && err.line !== null) {
    console.error(`[${context}]`, message, `(line: ${JSON.stringify(err.line)})`)
    return
  }
  console.error(`[${context}]`, message)
}
