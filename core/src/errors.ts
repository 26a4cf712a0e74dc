/**
 * Structured errors for the transfer builder.
 *
 * Every failure is terminal and carries the quantities that caused it in
 * `context`, so callers can decide whether to re-query balances, prompt
 * the user or give up.
 */

export const SLPErrorCodes = {
  PRECISION_EXCEEDED: 'PrecisionExceeded',
  AMOUNT_OVERFLOW: 'AmountOverflow',
  INVALID_AMOUNT: 'InvalidAmount',
  UNKNOWN_TOKEN: 'UnknownToken',
  INVALID_TOKEN_ID: 'InvalidTokenId',
  INSUFFICIENT_TOKEN_BALANCE: 'InsufficientTokenBalance',
  INSUFFICIENT_CURRENCY_BALANCE: 'InsufficientCurrencyBalance',
  ADDRESS_DECODE_FAILURE: 'AddressDecodeFailure',
  INVALID_SPENDABLE_OUTPUT: 'InvalidSpendableOutput',
  MALFORMED_SELECTION: 'MalformedSelection',
  INVALID_CONFIG: 'InvalidConfig',
  GENERIC_ERROR: 'GenericError'
} as const

export type SLPErrorCode = typeof SLPErrorCodes[keyof typeof SLPErrorCodes]

export type SLPErrorContext = Record<string, unknown>

/**
 * Base class of every error thrown by this library.
 */
export class SLPError extends Error {
  public readonly code: SLPErrorCode
  public readonly context?: SLPErrorContext

  constructor(
    message: string,
    code: SLPErrorCode = SLPErrorCodes.GENERIC_ERROR,
    context?: SLPErrorContext
  ) {
    super(message)
    this.name = 'SLPError'
    this.code = code
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Serializable form. Raw token amounts are bigints, which JSON cannot
   * carry, so they are rendered as decimal strings.
   */
  toJSON(): { code: SLPErrorCode; message: string; data?: SLPErrorContext } {
    return {
      code: this.code,
      message: this.message,
      ...(this.context && { data: stringifyBigInts(this.context) })
    }
  }

  static fromUnknown(error: unknown, defaultCode: SLPErrorCode = SLPErrorCodes.GENERIC_ERROR): SLPError {
    if (error instanceof SLPError) {
      return error
    }
    if (error instanceof Error) {
      return new SLPError(error.message, defaultCode, { originalError: error.name })
    }
    if (typeof error === 'string') {
      return new SLPError(error, defaultCode)
    }
    return new SLPError('An unknown error occurred', defaultCode)
  }
}

function stringifyBigInts(context: SLPErrorContext): SLPErrorContext {
  const out: SLPErrorContext = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value
  }
  return out
}

// ---------------------------------------------------------------------------
// Amount errors
// ---------------------------------------------------------------------------

export class PrecisionExceededError extends SLPError {
  constructor(ticker: string, decimals: number, amount: string) {
    super(
      `${ticker} supports maximum ${decimals} decimals but amount is ${amount}`,
      SLPErrorCodes.PRECISION_EXCEEDED,
      { ticker, decimals, amount }
    )
    this.name = 'PrecisionExceededError'
  }
}

export class AmountOverflowError extends SLPError {
  constructor(amount: string, decimals: number) {
    super(
      `Amount ${amount} does not fit in 8 unsigned bytes at ${decimals} decimals`,
      SLPErrorCodes.AMOUNT_OVERFLOW,
      { amount, decimals }
    )
    this.name = 'AmountOverflowError'
  }
}

export class InvalidAmountError extends SLPError {
  constructor(message: string, amount: unknown) {
    super(message, SLPErrorCodes.INVALID_AMOUNT, { amount })
    this.name = 'InvalidAmountError'
  }
}

// ---------------------------------------------------------------------------
// Token errors
// ---------------------------------------------------------------------------

export class UnknownTokenError extends SLPError {
  constructor(tokenId: string) {
    super(`Unknown token ${tokenId}`, SLPErrorCodes.UNKNOWN_TOKEN, { tokenId })
    this.name = 'UnknownTokenError'
  }
}

export class InvalidTokenIdError extends SLPError {
  constructor(tokenId: string) {
    super(
      `Invalid tokenId format: ${tokenId}. Expected 64 hex characters.`,
      SLPErrorCodes.INVALID_TOKEN_ID,
      { tokenId }
    )
    this.name = 'InvalidTokenIdError'
  }
}

// ---------------------------------------------------------------------------
// Balance errors
// ---------------------------------------------------------------------------

export class InsufficientTokenBalanceError extends SLPError {
  public readonly available: bigint
  public readonly requested: bigint

  constructor(tokenId: string, available: bigint, requested: bigint) {
    super(
      `Insufficient token balance. Have ${available}, need ${requested}`,
      SLPErrorCodes.INSUFFICIENT_TOKEN_BALANCE,
      { tokenId, available, requested }
    )
    this.name = 'InsufficientTokenBalanceError'
    this.available = available
    this.requested = requested
  }
}

export class InsufficientCurrencyBalanceError extends SLPError {
  public readonly accumulated: number
  public readonly required: number

  constructor(accumulated: number, sendSatoshis: number, fee: number) {
    const required = sendSatoshis + fee
    super(
      `Insufficient currency balance=${accumulated} required ${sendSatoshis} + ${fee} fee = ${required}`,
      SLPErrorCodes.INSUFFICIENT_CURRENCY_BALANCE,
      { accumulated, sendSatoshis, fee, required }
    )
    this.name = 'InsufficientCurrencyBalanceError'
    this.accumulated = accumulated
    this.required = required
  }
}

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

export class InvalidConfigError extends SLPError {
  constructor(source: 'env' | 'feePolicy', path: string, reason: string) {
    super(
      `Invalid ${source} setting ${path}: ${reason}`,
      SLPErrorCodes.INVALID_CONFIG,
      { source, path, reason }
    )
    this.name = 'InvalidConfigError'
  }
}

// ---------------------------------------------------------------------------
// Collaborator and internal errors
// ---------------------------------------------------------------------------

export class AddressDecodeFailureError extends SLPError {
  constructor(address: string, reason: string) {
    super(
      `Could not decode address ${address}: ${reason}`,
      SLPErrorCodes.ADDRESS_DECODE_FAILURE,
      { address, reason }
    )
    this.name = 'AddressDecodeFailureError'
  }
}

export class InvalidSpendableOutputError extends SLPError {
  constructor(index: number, reason: string) {
    super(
      `Spendable output #${index} is malformed: ${reason}`,
      SLPErrorCodes.INVALID_SPENDABLE_OUTPUT,
      { index, reason }
    )
    this.name = 'InvalidSpendableOutputError'
  }
}

/** A selection or plan that breaks its own balance invariants. Always a bug. */
export class MalformedSelectionError extends SLPError {
  constructor(message: string, context?: SLPErrorContext) {
    super(message, SLPErrorCodes.MALFORMED_SELECTION, context)
    this.name = 'MalformedSelectionError'
  }
}
