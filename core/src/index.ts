/**
 * @slp-transfer/core - token-aware transfer builder
 *
 * Builds transactions that move SLP-style tokens (quantities in an
 * OP_RETURN metadata output) together with the base currency on a UTXO
 * ledger:
 * - Decimal amount encoding with precision and 8-byte overflow checks
 * - Fee estimation for the metadata, receiver and change outputs
 * - Two-pass smallest-first input selection (token inputs, then currency)
 * - Assembly of the exact output list, signed offline by the wallet
 *
 * @example
 * ```typescript
 * import { SLP } from '@slp-transfer/core'
 *
 * const slp = new SLP({ wallet })
 * const signed = await slp.buildTransfer(tokenId, '1.5', recipientAddress)
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { SLP } from './SLP.js'

// Metadata encoding/decoding
export { SLPToken } from './SLPToken.js'
export type { DecodedSend, InvalidSend, SendDecodeResult } from './SLPToken.js'

// Draft adapter
export { SdkDraftTransaction } from './SdkDraftTransaction.js'
export type { UnlockerFor } from './SdkDraftTransaction.js'

// Core algorithm
export { toRawAmount, fromRawAmount } from './amounts.js'
export { perOutputCost, metadataPayloadSize, totalFee, inputCredit } from './fees.js'
export { selectTokenUtxos, validateSpendableOutputs } from './selection.js'
export { planTransfer, assembleTransfer, assertBalanced } from './assembly.js'
export type { Addressing, AssemblyTarget } from './assembly.js'

// Configuration and logging
export { DEFAULT_FEE_POLICY, FeePolicySchema, resolveConfig, resolveFeePolicy, readEnvSettings } from './config.js'
export type { EnvSettings } from './config.js'
export { createLogger } from './logging.js'
export type { SLPLogger, LogLevel } from './logging.js'

// Errors
export {
  SLPError,
  SLPErrorCodes,
  PrecisionExceededError,
  AmountOverflowError,
  InvalidAmountError,
  UnknownTokenError,
  InvalidTokenIdError,
  InsufficientTokenBalanceError,
  InsufficientCurrencyBalanceError,
  AddressDecodeFailureError,
  InvalidSpendableOutputError,
  MalformedSelectionError,
  InvalidConfigError
} from './errors.js'
export type { SLPErrorCode, SLPErrorContext } from './errors.js'

// Types
export type {
  TokenAnnotation,
  SpendableOutput,
  TokenDescriptor,
  DecimalAmount,
  SelectionResult,
  PlannedOutputKind,
  PlannedOutput,
  TransferPlan,
  DraftTransaction,
  SignedTransaction,
  AddressSource,
  SLPWallet,
  FeePolicy,
  SLPConfig,
  ResolvedSLPConfig
} from './types.js'

// Constants
export {
  DUST_LIMIT,
  INPUT_COST,
  OUTPUT_COST,
  OP_RETURN_BASE_SIZE,
  QUANTITY_SIZE,
  PROPAGATION_SLACK,
  ASSUMED_OUTPUTS,
  MAX_RAW_AMOUNT,
  MAX_SEND_QUANTITIES
} from './constants.js'

// Utilities
export { lockingScriptForAddress, outpointOf, sumTokenAmounts, sumSatoshis } from './utils.js'
