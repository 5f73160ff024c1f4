/**
 * 32-bit integer helpers shared by the hash combinators.
 *
 * JavaScript numbers are doubles; every helper here maps its result back onto
 * a signed 32-bit pattern so additions and multiplications wrap the way the
 * native format expects.
 */

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;

/**
 * Rotate the 32-bit pattern of `value` left by `shift` bits.
 * The pattern is shifted unsigned, so no sign bits leak in, and the result is
 * read back as signed two's complement. `shift` is taken modulo 32.
 */
export function rotateLeft(value: number, shift: number): number {
  return (value << shift) | (value >>> (32 - shift));
}

/**
 * Signed form of a 32-bit pattern.
 */
export function toInt32(value: number): number {
  return value | 0;
}

/**
 * Unsigned form of a 32-bit pattern, for hex display and persistence.
 */
export function toUint32(value: number): number {
  return value >>> 0;
}

/**
 * Format a hash as 8 hex digits, e.g. `0xd5313557`.
 */
export function formatHash(value: number): string {
  return `0x${toUint32(value).toString(16).padStart(8, '0')}`;
}

/**
 * True when `value` is an integer that denotes a 32-bit pattern in either
 * signed or unsigned form.
 */
export function isHashCode(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= UINT32_MAX;
}
