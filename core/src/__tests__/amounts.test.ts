/**
 * Amount codec tests
 */

import { toRawAmount, fromRawAmount } from '../amounts.js'
import { MAX_RAW_AMOUNT } from '../constants.js'
import {
  AmountOverflowError,
  InvalidAmountError,
  PrecisionExceededError,
  SLPErrorCodes
} from '../errors.js'
import { descriptor } from './helpers.js'

describe('toRawAmount', () => {
  it('should shift the decimal amount by the token decimals', () => {
    expect(toRawAmount('1.5', descriptor(8))).toBe(150000000n)
    expect(toRawAmount('2', descriptor(0))).toBe(2n)
    expect(toRawAmount('0.1', descriptor(1))).toBe(1n)
    expect(toRawAmount('0.05', descriptor(2))).toBe(5n)
  })

  it('should accept numbers and bigints', () => {
    expect(toRawAmount(1.5, descriptor(8))).toBe(150000000n)
    expect(toRawAmount(42n, descriptor(2))).toBe(4200n)
  })

  it('should accept exponent notation', () => {
    expect(toRawAmount('1e-8', descriptor(8))).toBe(1n)
    expect(toRawAmount('1.5e2', descriptor(0))).toBe(150n)
  })

  it('should ignore trailing fractional zeros when counting precision', () => {
    expect(toRawAmount('1.50', descriptor(1))).toBe(15n)
    expect(toRawAmount('10.000', descriptor(0))).toBe(10n)
  })

  it('should encode zero at any precision', () => {
    expect(toRawAmount('0', descriptor(0))).toBe(0n)
    expect(toRawAmount('0.000', descriptor(255))).toBe(0n)
  })

  describe('precision', () => {
    it('should reject more fractional digits than the token supports', () => {
      expect(() => toRawAmount('1.123', descriptor(2))).toThrow(PrecisionExceededError)
      expect(() => toRawAmount('0.5', descriptor(0))).toThrow(PrecisionExceededError)
    })

    it('should report the ticker and decimals', () => {
      expect(() => toRawAmount('1.123456789', descriptor(8)))
        .toThrow('TST supports maximum 8 decimals but amount is 1.123456789')
      expect(() => toRawAmount('1.123456789', descriptor(8)))
        .toThrow(expect.objectContaining({
          code: SLPErrorCodes.PRECISION_EXCEEDED,
          context: { ticker: 'TST', decimals: 8, amount: '1.123456789' }
        }))
    })
  })

  describe('overflow', () => {
    it('should accept the largest 8-byte value', () => {
      expect(toRawAmount('18446744073709551615', descriptor(0))).toBe(MAX_RAW_AMOUNT)
      expect(toRawAmount('184467440737.09551615', descriptor(8))).toBe(MAX_RAW_AMOUNT)
    })

    it('should refuse values at or above 2^64', () => {
      expect(() => toRawAmount('18446744073709551616', descriptor(0))).toThrow(AmountOverflowError)
      expect(() => toRawAmount('184467440737.09551616', descriptor(8))).toThrow(AmountOverflowError)
      expect(() => toRawAmount('1e30', descriptor(0))).toThrow(AmountOverflowError)
      expect(() => toRawAmount('1e1000000', descriptor(0))).toThrow(AmountOverflowError)
    })
  })

  describe('invalid input', () => {
    it.each(['-1', 'abc', '', '.5', '1,5'])('should reject %p', (input) => {
      expect(() => toRawAmount(input, descriptor(8))).toThrow(InvalidAmountError)
    })

    it('should reject non-finite numbers', () => {
      expect(() => toRawAmount(Number.NaN, descriptor(8))).toThrow(InvalidAmountError)
      expect(() => toRawAmount(Number.POSITIVE_INFINITY, descriptor(8))).toThrow(InvalidAmountError)
    })

    it('should reject descriptors with out-of-range decimals', () => {
      expect(() => toRawAmount('1', descriptor(256))).toThrow(InvalidAmountError)
      expect(() => toRawAmount('1', descriptor(1.5))).toThrow(InvalidAmountError)
    })
  })
})

describe('fromRawAmount', () => {
  it('should render without trailing zeros', () => {
    expect(fromRawAmount(150000000n, descriptor(8))).toBe('1.5')
    expect(fromRawAmount(100n, descriptor(2))).toBe('1')
    expect(fromRawAmount(5n, descriptor(2))).toBe('0.05')
    expect(fromRawAmount(0n, descriptor(8))).toBe('0')
    expect(fromRawAmount(7n, descriptor(0))).toBe('7')
  })

  it('should reject amounts outside the 8-byte range', () => {
    expect(() => fromRawAmount(-1n, descriptor(8))).toThrow(InvalidAmountError)
    expect(() => fromRawAmount(MAX_RAW_AMOUNT + 1n, descriptor(8))).toThrow(InvalidAmountError)
  })

  it('should round-trip every raw amount for decimals 0 through 9', () => {
    const samples = [0n, 1n, 9n, 10n, 546n, 123456789n, 150000000n, 10n ** 18n, MAX_RAW_AMOUNT - 1n, MAX_RAW_AMOUNT]
    for (let decimals = 0; decimals <= 9; decimals++) {
      for (const raw of samples) {
        expect(toRawAmount(fromRawAmount(raw, descriptor(decimals)), descriptor(decimals))).toBe(raw)
      }
    }
  })
})
