/**
 * zod schemas for request bodies and import rows that carry GTINs.
 *
 * Each schema trims and zero-pads like the matching fix function and
 * reports failures as custom issues with `params.errorCode` set.
 */

import { z } from 'zod'
import type { FixResult } from './errors'
import { fix8 } from './gtin8'
import { fix12 } from './gtin12'
import { fix13 } from './gtin13'
import { fix14 } from './gtin14'
import { normalizeGtin } from './detect'
import type { GtinVariant } from './variant'

const FIXERS: Record<GtinVariant, (code: string) => FixResult> = {
  8: fix8,
  12: fix12,
  13: fix13,
  14: fix14,
}

function fromFixer(fixer: (code: string) => FixResult) {
  return z.string().transform((value, ctx) => {
    const result = fixer(value)
    if (!result.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.message,
        params: { errorCode: result.error.code },
      })
      return z.NEVER
    }
    return result.code
  })
}

export function gtinSchema(variant: GtinVariant) {
  return fromFixer(FIXERS[variant])
}

export const gtin8Schema = gtinSchema(8)
export const gtin12Schema = gtinSchema(12)
export const gtin13Schema = gtinSchema(13)
export const gtin14Schema = gtinSchema(14)

/** Accepts any supported length; see normalizeGtin */
export const anyGtinSchema = fromFixer(normalizeGtin)
