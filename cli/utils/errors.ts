/**
 * Error formatting utilities for CLI
 */

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Format error for CLI output
 *
 * Format: pkgresolve <command>: <message>
 */
export function formatError(command: string, err: unknown): string {
  return `pkgresolve ${command}: ${getErrorMessage(err)}`
}

/**
 * Create an unknown command error message
 */
export function unknownCommandError(command: string): string {
  return `pkgresolve: unknown command '${command}'`
}

/**
 * Create an invalid option value error message
 */
export function invalidOptionError(command: string, option: string, value: unknown): string {
  return `pkgresolve ${command}: invalid value for --${option}: ${String(value)}`
}
