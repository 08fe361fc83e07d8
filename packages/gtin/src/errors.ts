/**
 * Fix errors
 *
 * Failures from the fix* functions are returned as values. Callers branch
 * on `code`; `message` is a fixed string suitable for display.
 */

export const FIX_ERROR_CODES = {
  TOO_LONG: 'TOO_LONG',
  BAD_CHARACTER: 'BAD_CHARACTER',
  BAD_CHECKSUM: 'BAD_CHECKSUM',
} as const

export type FixErrorCode = (typeof FIX_ERROR_CODES)[keyof typeof FIX_ERROR_CODES]

export interface TooLongError {
  code: typeof FIX_ERROR_CODES.TOO_LONG
  message: string
  /** Length after trimming whitespace */
  length: number
  maxLength: number
}

export interface BadCharacterError {
  code: typeof FIX_ERROR_CODES.BAD_CHARACTER
  message: string
  character: string
  /** Zero-based index in the trimmed, zero-padded code */
  position: number
}

export interface BadChecksumError {
  code: typeof FIX_ERROR_CODES.BAD_CHECKSUM
  message: string
  expected: number
  actual: number
}

export type FixError = TooLongError | BadCharacterError | BadChecksumError

export type FixResult =
  | { ok: true; code: string }
  | { ok: false; error: FixError }

export function tooLong(length: number, maxLength: number): TooLongError {
  return {
    code: FIX_ERROR_CODES.TOO_LONG,
    message: `Code has ${length} characters; at most ${maxLength} allowed`,
    length,
    maxLength,
  }
}

export function badCharacter(character: string, position: number): BadCharacterError {
  return {
    code: FIX_ERROR_CODES.BAD_CHARACTER,
    message: `Invalid character ${JSON.stringify(character)} at position ${position}`,
    character,
    position,
  }
}

export function badChecksum(expected: number, actual: number): BadChecksumError {
  return {
    code: FIX_ERROR_CODES.BAD_CHECKSUM,
    message: `Check digit is ${actual}, expected ${expected}`,
    expected,
    actual,
  }
}

export function describeFixError(error: FixError): string {
  return error.message
}

/**
 * Thrown only by unwrapFix, for callers that prefer exceptions.
 */
export class GtinFixError extends Error {
  readonly errorCode: FixErrorCode
  readonly details: FixError

  constructor(details: FixError) {
    super(details.message)
    this.name = 'GtinFixError'
    this.errorCode = details.code
    this.details = details
  }
}

/**
 * Return the normalized code or throw a GtinFixError.
 */
export function unwrapFix(result: FixResult): string {
  if (!result.ok) {
    throw new GtinFixError(result.error)
  }
  return result.code
}
