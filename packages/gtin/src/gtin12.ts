/**
 * GTIN-12 (UPC-A): the twelve-digit North American retail code.
 *
 * Spreadsheets and databases that store UPCs as integers drop the leading
 * zero, so fix12 pads short input back to twelve digits before validating.
 */

import type { FixResult } from './errors'
import { checkCode, fixCode } from './variant'

export const LENGTH = 12

/**
 * Check that a code is exactly twelve ASCII digits with a correct check digit.
 *
 * @example
 * ```ts
 * check12('036000291452') // true
 * check12('000000000001') // false, bad check digit
 * check12('00000000000')  // false, too short
 * ```
 */
export function check12(code: string): boolean {
  return checkCode(code, LENGTH)
}

/**
 * Repair length problems introduced by manual entry or integer storage.
 *
 * @example
 * ```ts
 * fix12('87248795257')   // { ok: true, code: '087248795257' }
 * fix12('087248795257 ') // { ok: true, code: '087248795257' }
 * fix12('123412341234123').ok // false, TOO_LONG
 * ```
 */
export function fix12(code: string): FixResult {
  return fixCode(code, LENGTH)
}

export { check12 as check, fix12 as fix }
