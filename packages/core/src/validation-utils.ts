/**
 * Shared validation helpers with consistent error messages.
 * @public
 */

/**
 * Validates a URL string.
 * @param url - URL string to validate
 * @param context - Optional context string for error messages
 * @throws \{Error\} When URL is empty or invalid format
 * @internal
 */
function validateUrl(url: string, context?: string): void {
  if (!url) {
    throw new Error(`${context ? context + ': ' : ''}URL is required`);
  }

  try {
    new URL(url);
  } catch {
    throw new Error(`${context ? context + ': ' : ''}Invalid URL format: ${url}`);
  }
}

/**
 * Collection of validation utility functions.
 * @example
 * ```typescript
 * ValidationUtils.validateUrl('https://oauth.example.com', 'OAuth base URL');
 * ValidationUtils.validatePositiveDuration(30_000, 'requestTimeoutMs');
 * ```
 * @public
 */
export const ValidationUtils = {
  validateUrl,
  /**
   * Validates a duration in milliseconds is a positive finite number.
   * @throws \{Error\} When the value is zero, negative or not finite
   */
  validatePositiveDuration: (value: number, name: string): void => {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`${name} must be a positive number of milliseconds, got ${value}`);
    }
  },
};
