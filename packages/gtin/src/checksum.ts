/**
 * GS1 check digit arithmetic shared by every GTIN length.
 *
 * Weights alternate 3, 1, 3, 1, ... starting from the rightmost payload
 * digit (the digit immediately left of the check digit).
 */

const ZERO = '0'.charCodeAt(0)
const NINE = '9'.charCodeAt(0)

/**
 * Compute the check digit for a payload (every digit except the check digit).
 */
export function computeCheckDigit(payload: readonly number[]): number {
  let sum = 0
  for (let i = 0; i < payload.length; i++) {
    const digit = payload[payload.length - 1 - i]
    sum += digit * (i % 2 === 0 ? 3 : 1)
  }
  return (10 - (sum % 10)) % 10
}

/**
 * True when every character is an ASCII digit '0'-'9'.
 * Unicode digits from other scripts do not count.
 */
export function isAsciiNumeric(value: string): boolean {
  return findNonDigit(value) === -1
}

/** Index of the first non-ASCII-digit character, or -1. */
export function findNonDigit(value: string): number {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i)
    if (code < ZERO || code > NINE) return i
  }
  return -1
}

/**
 * Parse an all-digit string into its digit values.
 * Callers check isAsciiNumeric first.
 */
export function toDigits(code: string): number[] {
  const digits: number[] = []
  for (let i = 0; i < code.length; i++) {
    digits.push(code.charCodeAt(i) - ZERO)
  }
  return digits
}

/**
 * Left-pad with '0' up to `size`. Strings already that long are returned as-is.
 */
export function zeroPad(value: string, size: number): string {
  return value.length >= size ? value : value.padStart(size, '0')
}
