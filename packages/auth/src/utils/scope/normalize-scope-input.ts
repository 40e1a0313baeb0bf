/**
 * Parses space-separated scope string into array of individual scope values.
 *
 * Splits on whitespace and filters out empty strings, handling cases where
 * multiple consecutive spaces exist in the input.
 * @param scope - Space-separated scope string (e.g., 'read write admin').
 *   Returns empty array if undefined or empty.
 * @returns Array of individual scope strings with empty values removed
 * @example
 * ```typescript
 * parseScopes('read write admin')    // => ['read', 'write', 'admin']
 * parseScopes('read  write   admin') // => ['read', 'write', 'admin']
 * parseScopes('')                    // => []
 * ```
 * @public
 */
export function parseScopes(scope?: string): string[] {
  if (!scope) return [];
  return scope.split(/\s+/).filter(Boolean);
}

/**
 * Normalizes a scope list or a space-separated scope string to an array.
 * @example
 * ```typescript
 * normalizeScopeInput('read write')            // => ['read', 'write']
 * normalizeScopeInput(['read write', 'admin']) // => ['read', 'write', 'admin']
 * ```
 * @public
 */
export function normalizeScopeInput(value: string | readonly string[]): string[] {
  if (typeof value === 'string') {
    return parseScopes(value);
  }
  return value.flatMap((entry) => parseScopes(entry));
}
