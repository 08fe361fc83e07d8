/**
 * GTIN-8 (EAN-8): eight digits, used on packaging too small for EAN-13.
 */

import type { FixResult } from './errors'
import { checkCode, fixCode } from './variant'

export const LENGTH = 8

/**
 * Check that a code is exactly eight ASCII digits with a correct check digit.
 *
 * @example
 * ```ts
 * check8('96385074') // true
 * check8('9638507')  // false, too short
 * ```
 */
export function check8(code: string): boolean {
  return checkCode(code, LENGTH)
}

/**
 * Trim surrounding whitespace and restore dropped leading zeros, then validate.
 * The check digit is never rewritten.
 *
 * @example
 * ```ts
 * fix8(' 96385074 ') // { ok: true, code: '96385074' }
 * ```
 */
export function fix8(code: string): FixResult {
  return fixCode(code, LENGTH)
}

export { check8 as check, fix8 as fix }
