/**
 * Error handling and formatting utilities
 */

/**
 * Format an unknown error value to a string message
 *
 * @param error - The error to format (can be Error, string, or any value)
 * @returns Formatted error message
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Check if an error is a file not found error
 *
 * @param error - The error to check
 * @returns True if the error is ENOENT
 */
export function isFileNotFoundError(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

/**
 * Compile-time exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
