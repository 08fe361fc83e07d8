/**
 * GTIN-14: identifies trade units (cases, pallets). The leading digit is the
 * packaging indicator; a GTIN-12 or GTIN-13 padded with zeros is also a
 * valid GTIN-14.
 */

import type { FixResult } from './errors'
import { checkCode, fixCode } from './variant'

export const LENGTH = 14

export function check14(code: string): boolean {
  return checkCode(code, LENGTH)
}

/**
 * Trim, zero-pad to fourteen digits and validate.
 *
 * @example
 * ```ts
 * fix14('036000291452') // { ok: true, code: '00036000291452' }
 * ```
 */
export function fix14(code: string): FixResult {
  return fixCode(code, LENGTH)
}

export { check14 as check, fix14 as fix }
