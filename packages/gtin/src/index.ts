/**
 * @gtin-validate/gtin
 *
 * Validation and normalization for GTIN-8, GTIN-12 (UPC-A), GTIN-13 (EAN-13)
 * and GTIN-14 codes.
 *
 * Each length has its own check/fix pair so the expected type is stated at
 * the call site:
 *
 * ```ts
 * import { check12, fix12 } from '@gtin-validate/gtin'
 *
 * check12('036000291452') // true
 * fix12('36000291452')    // { ok: true, code: '036000291452' }
 * ```
 */

export { check8, fix8 } from './gtin8'
export { check12, fix12 } from './gtin12'
export { check13, fix13 } from './gtin13'
export { check14, fix14 } from './gtin14'

export * as gtin8 from './gtin8'
export * as gtin12 from './gtin12'
export * as gtin13 from './gtin13'
export * as gtin14 from './gtin14'

export { GTIN_VARIANTS, isGtinVariant } from './variant'
export type { GtinVariant } from './variant'

export { computeCheckDigit, isAsciiNumeric, toDigits, zeroPad } from './checksum'

export {
  FIX_ERROR_CODES,
  GtinFixError,
  describeFixError,
  unwrapFix,
} from './errors'
export type {
  FixError,
  FixErrorCode,
  FixResult,
  TooLongError,
  BadCharacterError,
  BadChecksumError,
} from './errors'

export { detectVariant, normalizeGtin, toGtin14 } from './detect'

export {
  gtinSchema,
  gtin8Schema,
  gtin12Schema,
  gtin13Schema,
  gtin14Schema,
  anyGtinSchema,
} from './schemas'

export { auditCodes } from './audit'
export type { AuditOptions, AuditRejection, AuditReport } from './audit'
