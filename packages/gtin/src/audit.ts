/**
 * Batch audit
 *
 * Runs a list of raw codes through the fixer for one variant and tallies
 * the outcome. Logging is opt-in through `options.logger`.
 */

import type { ILogger } from '@gtin-validate/logger'
import { FIX_ERROR_CODES, type FixError, type FixErrorCode } from './errors'
import { fixCode, type GtinVariant } from './variant'

export interface AuditRejection {
  input: string
  index: number
  error: FixError
}

export interface AuditReport {
  variant: GtinVariant
  total: number
  /** Normalized codes, in input order */
  fixed: string[]
  /** Inputs that were already normalized */
  unchanged: number
  /** Inputs repaired by trimming or zero-padding */
  corrected: number
  rejected: AuditRejection[]
  errorCounts: Record<FixErrorCode, number>
}

export interface AuditOptions {
  logger?: ILogger
}

export function auditCodes(
  codes: Iterable<string>,
  variant: GtinVariant,
  options: AuditOptions = {}
): AuditReport {
  const log = options.logger?.child('audit', { variant })

  const report: AuditReport = {
    variant,
    total: 0,
    fixed: [],
    unchanged: 0,
    corrected: 0,
    rejected: [],
    errorCounts: {
      [FIX_ERROR_CODES.TOO_LONG]: 0,
      [FIX_ERROR_CODES.BAD_CHARACTER]: 0,
      [FIX_ERROR_CODES.BAD_CHECKSUM]: 0,
    },
  }

  for (const input of codes) {
    const index = report.total++
    const result = fixCode(input, variant)

    if (result.ok) {
      report.fixed.push(result.code)
      if (result.code === input) {
        report.unchanged++
      } else {
        report.corrected++
      }
      continue
    }

    report.rejected.push({ input, index, error: result.error })
    report.errorCounts[result.error.code]++
    log?.debug('Rejected code', { index, input, errorCode: result.error.code })
  }

  log?.info('Audit complete', {
    total: report.total,
    unchanged: report.unchanged,
    corrected: report.corrected,
    rejected: report.rejected.length,
  })

  return report
}
