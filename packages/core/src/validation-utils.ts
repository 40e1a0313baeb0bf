/**
 * Shared validation helpers for configuration handed to credential constructors.
 *
 * Failures throw plain `Error`s with a context prefix; callers map them onto
 * their own error types.
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
 * ValidationUtils.validateUrl('https://oauth2.example.com/token', 'Token URI');
 * ```
 * @public
 */
export const ValidationUtils = {
  validateUrl,
};
