/**
 * error-helpers.ts
 * Error message extraction shared by the queue, controllers and notifiers
 */

/**
 * Safely extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Extract error details for logging. The stack stays in logs and never reaches requesters.
 */
export function getErrorDetails(error: unknown): {
  message: string;
  name: string;
  stack?: string;
} {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }

  if (typeof error === 'string') {
    return { message: error, name: 'StringError' };
  }

  return { message: String(error), name: 'Unknown' };
}

/**
 * Truncate text for user-facing previews
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}
