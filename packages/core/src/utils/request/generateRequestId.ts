import { randomBytes } from 'crypto';

/**
 * Correlation id for one outgoing token or metadata request, e.g.
 * `token_m1x2y3z4_9f2c41ab`. Log events of the same request share it.
 * @param prefix - Kind of request, such as `token` or `metadata`
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const stamp = Date.now().toString(36);
  const suffix = randomBytes(4).toString('hex');
  return prefix ? `${prefix}_${stamp}_${suffix}` : `${stamp}_${suffix}`;
}
