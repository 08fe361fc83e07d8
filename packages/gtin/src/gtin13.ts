/**
 * GTIN-13 (EAN-13)
 */

import type { FixResult } from './errors'
import { checkCode, fixCode } from './variant'

export const LENGTH = 13

/**
 * @example
 * ```ts
 * check13('4006381333931') // true
 * ```
 */
export function check13(code: string): boolean {
  return checkCode(code, LENGTH)
}

/**
 * @example
 * ```ts
 * fix13('4006381333931\n') // { ok: true, code: '4006381333931' }
 * ```
 */
export function fix13(code: string): FixResult {
  return fixCode(code, LENGTH)
}

export { check13 as check, fix13 as fix }
