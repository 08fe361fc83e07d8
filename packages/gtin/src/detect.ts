/**
 * Length-agnostic helpers for inputs whose GTIN type is not known up front,
 * such as merchant feeds that mix UPC-A, EAN-13 and case codes.
 */

import type { FixResult } from './errors'
import { checkCode, fixCode, GTIN_VARIANTS, isGtinVariant, trimCode, type GtinVariant } from './variant'
import { zeroPad } from './checksum'

/**
 * Return the variant that accepts the code as-is, or null.
 * No trimming or padding is applied.
 */
export function detectVariant(code: string): GtinVariant | null {
  for (const variant of GTIN_VARIANTS) {
    if (checkCode(code, variant)) return variant
  }
  return null
}

/**
 * Fix a code of unknown type.
 *
 * A trimmed length of 8, 12, 13 or 14 is validated as that variant. Any
 * other length up to 14 is padded to GTIN-14, since GTIN-14 is the only
 * form that can hold every shorter code.
 */
export function normalizeGtin(code: string): FixResult {
  const length = Array.from(trimCode(code)).length
  return fixCode(code, isGtinVariant(length) ? length : 14)
}

/**
 * Widen a valid GTIN of any length to its 14-digit canonical form.
 *
 * @returns 14-digit string, or null when the code is not valid as-is
 */
export function toGtin14(code: string): string | null {
  if (detectVariant(code) === null) return null
  return zeroPad(code, 14)
}
