/**
 * Amount codec: human decimal token amounts to raw 8-byte unsigned
 * integers and back.
 */

import { MAX_RAW_AMOUNT, MAX_TOKEN_DECIMALS } from './constants.js'
import { AmountOverflowError, InvalidAmountError, PrecisionExceededError } from './errors.js'
import type { DecimalAmount, TokenDescriptor } from './types.js'

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/

// 2^64 - 1 has 20 digits
const MAX_INTEGER_DIGITS = MAX_RAW_AMOUNT.toString().length

/**
 * A non-negative decimal as `digits * 10^-scale`, with no trailing
 * fractional zeros and no negative scale.
 */
interface ParsedDecimal {
  digits: string
  scale: number
}

function toDecimalText(amount: DecimalAmount): string {
  if (typeof amount === 'number') {
    if (!Number.isFinite(amount)) {
      throw new InvalidAmountError('Amount must be a finite number', amount)
    }
    return String(amount)
  }
  return String(amount).trim()
}

function parseDecimal(text: string, original: DecimalAmount): ParsedDecimal {
  const match = DECIMAL_PATTERN.exec(text)
  if (match === null) {
    throw new InvalidAmountError(`Amount must be a non-negative decimal, got ${text}`, original)
  }
  const [, integerPart, fractionPart = '', exponentPart = '0'] = match
  let digits = (integerPart + fractionPart).replace(/^0+(?=\d)/, '')
  let scale = fractionPart.length - Number(exponentPart)

  while (scale > 0 && digits.length > 1 && digits.endsWith('0')) {
    digits = digits.slice(0, -1)
    scale--
  }
  if (digits === '0') {
    return { digits, scale: 0 }
  }
  return { digits, scale }
}

function validateDecimals(descriptor: TokenDescriptor): void {
  const { decimals } = descriptor
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_TOKEN_DECIMALS) {
    throw new InvalidAmountError(`Token decimals must be an integer in [0, ${MAX_TOKEN_DECIMALS}]`, decimals)
  }
}

/**
 * Convert a decimal token amount to its raw integer representation.
 *
 * @throws PrecisionExceededError when the amount has more fractional digits than the token allows
 * @throws AmountOverflowError when the scaled amount exceeds 2^64 - 1
 * @throws InvalidAmountError for negative or non-numeric input
 *
 * @example
 * ```typescript
 * toRawAmount('1.5', { tokenId, ticker: 'TOK', decimals: 8 }) // 150000000n
 * ```
 */
export function toRawAmount(amount: DecimalAmount, descriptor: TokenDescriptor): bigint {
  validateDecimals(descriptor)
  const text = toDecimalText(amount)
  const { digits, scale } = parseDecimal(text, amount)

  if (scale > descriptor.decimals) {
    throw new PrecisionExceededError(descriptor.ticker, descriptor.decimals, text)
  }
  if (digits === '0') return 0n
  // Cheap bound before building a huge bigint from an exponent like 1e100000
  if (digits.length - scale + descriptor.decimals > MAX_INTEGER_DIGITS) {
    throw new AmountOverflowError(text, descriptor.decimals)
  }

  const raw = BigInt(digits) * 10n ** BigInt(descriptor.decimals - scale)
  if (raw > MAX_RAW_AMOUNT) {
    throw new AmountOverflowError(text, descriptor.decimals)
  }
  return raw
}

/**
 * Render a raw amount as decimal text without trailing fractional zeros.
 */
export function fromRawAmount(raw: bigint, descriptor: TokenDescriptor): string {
  validateDecimals(descriptor)
  if (raw < 0n || raw > MAX_RAW_AMOUNT) {
    throw new InvalidAmountError(`Raw amount must be in [0, ${MAX_RAW_AMOUNT}]`, raw)
  }
  const { decimals } = descriptor
  if (decimals === 0) return raw.toString()

  const padded = raw.toString().padStart(decimals + 1, '0')
  const integerPart = padded.slice(0, padded.length - decimals)
  const fractionPart = padded.slice(padded.length - decimals).replace(/0+$/, '')
  return fractionPart.length > 0 ? `${integerPart}.${fractionPart}` : integerPart
}
