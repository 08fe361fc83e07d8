import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, type LogLevel } from '@gtin-validate/logger'
import { auditCodes } from '../audit'

const INPUTS = ['036000291452', ' 36000291452', '000000000002', '0360002914521', '03600029A452']

describe('auditCodes', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('tallies fixed and rejected codes', () => {
    const report = auditCodes(INPUTS, 12)

    expect(report.variant).toBe(12)
    expect(report.total).toBe(5)
    expect(report.fixed).toEqual(['036000291452', '036000291452'])
    expect(report.unchanged).toBe(1)
    expect(report.corrected).toBe(1)
    expect(report.rejected.map((r) => [r.index, r.input, r.error.code])).toEqual([
      [2, '000000000002', 'BAD_CHECKSUM'],
      [3, '0360002914521', 'TOO_LONG'],
      [4, '03600029A452', 'BAD_CHARACTER'],
    ])
    expect(report.errorCounts).toEqual({ TOO_LONG: 1, BAD_CHARACTER: 1, BAD_CHECKSUM: 1 })
  })

  it('accepts any iterable', () => {
    function* codes() {
      yield '96385074'
      yield '96385075'
    }
    const report = auditCodes(codes(), 8)
    expect(report.total).toBe(2)
    expect(report.fixed).toEqual(['96385074'])
    expect(report.errorCounts.BAD_CHECKSUM).toBe(1)
  })

  it('logs nothing without a logger', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})

    auditCodes(INPUTS, 12)

    expect(info).not.toHaveBeenCalled()
    expect(debug).not.toHaveBeenCalled()
  })

  it('logs rejections and a summary through the given logger', () => {
    const lines: Array<[LogLevel, string]> = []
    const logger = createLogger('catalog', {
      level: 'debug',
      format: 'json',
      sink: (level, line) => lines.push([level, line]),
      now: () => new Date('2026-01-01T00:00:00.000Z'),
    })

    auditCodes(INPUTS, 12, { logger })

    expect(lines.map(([level]) => level)).toEqual(['debug', 'debug', 'debug', 'info'])
    expect(JSON.parse(lines[0][1])).toEqual({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'debug',
      service: 'catalog',
      component: 'audit',
      message: 'Rejected code',
      variant: 12,
      index: 2,
      input: '000000000002',
      errorCode: 'BAD_CHECKSUM',
    })
    expect(JSON.parse(lines[3][1])).toEqual({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'info',
      service: 'catalog',
      component: 'audit',
      message: 'Audit complete',
      variant: 12,
      total: 5,
      unchanged: 1,
      corrected: 1,
      rejected: 3,
    })
  })

  it('respects the logger level', () => {
    const lines: string[] = []
    const logger = createLogger('catalog', {
      level: 'info',
      format: 'json',
      sink: (_level, line) => lines.push(line),
    })

    auditCodes(INPUTS, 12, { logger })

    expect(lines).toHaveLength(1)
  })
})
