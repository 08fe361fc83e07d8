import { describe, it, expect } from 'vitest'
import { computeCheckDigit, findNonDigit, isAsciiNumeric, toDigits, zeroPad } from '../checksum'

describe('computeCheckDigit', () => {
  it.each([
    ['00000000000', 0],
    ['12345678901', 2],
    ['12345678908', 1],
    ['03600029145', 2],
    ['99999999999', 3],
    ['123412341234', 4],
    ['924987431354', 5],
    ['9249874313544', 7],
    ['0101010101010', 4],
    ['9638507', 4],
  ])('payload %s -> %d', (payload, expected) => {
    expect(computeCheckDigit(toDigits(payload))).toBe(expected)
  })

  it('returns 0 rather than 10 when the sum is a multiple of ten', () => {
    // 3*3 + 1 = 10
    expect(computeCheckDigit([1, 3])).toBe(0)
  })

  it('weights the rightmost payload digit by 3', () => {
    expect(computeCheckDigit([1])).toBe(7)
    expect(computeCheckDigit([1, 0])).toBe(9)
  })

  it('ignores leading zeros', () => {
    expect(computeCheckDigit(toDigits('00003600029145'))).toBe(2)
  })

  it('returns 0 for an empty payload', () => {
    expect(computeCheckDigit([])).toBe(0)
  })
})

describe('isAsciiNumeric', () => {
  it.each(['0', '1', '00', '99', ''])('accepts %j', (value) => {
    expect(isAsciiNumeric(value)).toBe(true)
  })

  it.each(['a', '0a', '-1', '4.2', ' 1', '٣'])('rejects %j', (value) => {
    expect(isAsciiNumeric(value)).toBe(false)
  })
})

describe('findNonDigit', () => {
  it('returns the index of the first non-digit', () => {
    expect(findNonDigit('12a4b')).toBe(2)
  })

  it('returns -1 when every character is a digit', () => {
    expect(findNonDigit('1234')).toBe(-1)
  })
})

describe('toDigits', () => {
  it('parses each character', () => {
    expect(toDigits('0907')).toEqual([0, 9, 0, 7])
  })
})

describe('zeroPad', () => {
  it('pads on the left', () => {
    expect(zeroPad('hello', 6)).toBe('0hello')
    expect(zeroPad('36', 5)).toBe('00036')
  })

  it('returns strings at or over the size unchanged', () => {
    expect(zeroPad('', 0)).toBe('')
    expect(zeroPad('hello', 5)).toBe('hello')
    expect(zeroPad('hello', 3)).toBe('hello')
  })
})
