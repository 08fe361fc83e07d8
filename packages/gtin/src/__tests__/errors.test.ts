import { describe, it, expect } from 'vitest'
import {
  badChecksum,
  describeFixError,
  GtinFixError,
  tooLong,
  unwrapFix,
} from '../errors'
import { fix12 } from '../gtin12'

describe('unwrapFix', () => {
  it('returns the code on success', () => {
    expect(unwrapFix(fix12('36000291452'))).toBe('036000291452')
  })

  it('throws GtinFixError on failure', () => {
    expect(() => unwrapFix(fix12('000000000002'))).toThrow(GtinFixError)

    try {
      unwrapFix(fix12('000000000002'))
    } catch (error) {
      expect(error).toBeInstanceOf(GtinFixError)
      if (error instanceof GtinFixError) {
        expect(error.name).toBe('GtinFixError')
        expect(error.errorCode).toBe('BAD_CHECKSUM')
        expect(error.message).toBe('Check digit is 2, expected 0')
        expect(error.details).toEqual(badChecksum(0, 2))
      }
    }
  })
})

describe('describeFixError', () => {
  it('returns the fixed message', () => {
    expect(describeFixError(tooLong(15, 14))).toBe('Code has 15 characters; at most 14 allowed')
  })
})
