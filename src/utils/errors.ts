/**
 * Error types and helpers
 */

/**
 * Raised when site date text matches no recognized pattern
 */
export class DateParseError extends Error {
  readonly text: string;

  constructor(text: string) {
    super(`Unrecognized date format: "${text}"`);
    this.name = 'DateParseError';
    this.text = text;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
