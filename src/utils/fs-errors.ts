/**
 * File-system error helpers.
 *
 * Errors raised by Node's fs may come from another realm (Jest runs tests in a
 * vm context), so these checks inspect the error shape instead of using instanceof.
 */

export function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
