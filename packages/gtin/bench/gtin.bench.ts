import { bench, describe } from 'vitest'
import { check8, check12, check13, check14, fix12, normalizeGtin } from '../src'

describe('check', () => {
  bench('gtin8 check', () => {
    check8('00000000')
  })

  bench('gtin12 check', () => {
    check12('000000000000')
  })

  bench('gtin13 check', () => {
    check13('0000000000000')
  })

  bench('gtin14 check', () => {
    check14('00000000000000')
  })
})

describe('fix', () => {
  bench('gtin12 fix with padding', () => {
    fix12(' 36000291452 ')
  })

  bench('normalizeGtin', () => {
    normalizeGtin('4006381333931')
  })
})
