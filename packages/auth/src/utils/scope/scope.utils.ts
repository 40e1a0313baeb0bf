/**
 * Scope utilities shared by scoped credentials and the token grants.
 * @example
 * ```typescript
 * ScopeUtils.hasScopes(['read', 'write'], 'read');      // => true
 * ScopeUtils.formatScopes(['read', 'write']);           // => 'read write'
 * ```
 * @public
 * @see file:./normalize-scope-input.ts - Core parsing and normalization implementations
 */

import { parseScopes, normalizeScopeInput } from './normalize-scope-input.js';

export class ScopeUtils {
  public static parseScopes = parseScopes;
  public static normalizeScopeInput = normalizeScopeInput;

  /**
   * Converts scopes to the space-separated form used on the wire.
   */
  public static formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Checks that every requested scope was granted.
   * @param granted - Scopes the credentials hold; none when undefined
   * @param requested - A scope list or a space-separated string
   */
  public static hasScopes(
    granted: readonly string[] | undefined,
    requested: string | readonly string[],
  ): boolean {
    const available = new Set(granted ?? []);
    return normalizeScopeInput(requested).every((scope) => available.has(scope));
  }
}

export { parseScopes, normalizeScopeInput } from './normalize-scope-input.js';
