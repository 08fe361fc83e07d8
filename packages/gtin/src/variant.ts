/**
 * Length-parameterized check and fix.
 *
 * The public per-length functions (check8, fix12, ...) wrap these; the
 * length argument is not part of the exported surface.
 */

import { computeCheckDigit, isAsciiNumeric, toDigits } from './checksum'
import { badCharacter, badChecksum, tooLong, type FixResult } from './errors'

/** Supported GTIN lengths per GS1 */
export const GTIN_VARIANTS = [8, 12, 13, 14] as const

export type GtinVariant = (typeof GTIN_VARIANTS)[number]

export function isGtinVariant(length: number): length is GtinVariant {
  return (GTIN_VARIANTS as readonly number[]).includes(length)
}

/**
 * Expected check digit for a code of any length, using all but its last digit.
 * The code must already be all digits.
 */
function expectedCheckDigit(digits: readonly number[]): number {
  return computeCheckDigit(digits.slice(0, -1))
}

export function checkCode(code: string, length: GtinVariant): boolean {
  if (code.length !== length) return false
  if (!isAsciiNumeric(code)) return false

  const digits = toDigits(code)
  return digits[length - 1] === expectedCheckDigit(digits)
}

// ECMAScript whitespace plus NEL (U+0085), which trim() leaves in place
const SURROUNDING_WHITESPACE = /^[\s\u0085]+|[\s\u0085]+$/g

/** Strip leading and trailing whitespace, NEL included. */
export function trimCode(code: string): string {
  return code.replace(SURROUNDING_WHITESPACE, '')
}

/**
 * Trim, zero-pad and validate. Lengths and BAD_CHARACTER positions count
 * code points, so an emoji is one character.
 */
export function fixCode(code: string, length: GtinVariant): FixResult {
  const chars = Array.from(trimCode(code))

  if (chars.length > length) {
    return { ok: false, error: tooLong(chars.length, length) }
  }

  const padded = [...Array<string>(length - chars.length).fill('0'), ...chars]

  const bad = padded.findIndex((char) => !isAsciiNumeric(char))
  if (bad !== -1) {
    return { ok: false, error: badCharacter(padded[bad], bad) }
  }

  const normalized = padded.join('')
  const digits = toDigits(normalized)
  const expected = expectedCheckDigit(digits)
  const actual = digits[length - 1]
  if (expected !== actual) {
    return { ok: false, error: badChecksum(expected, actual) }
  }

  return { ok: true, code: normalized }
}
