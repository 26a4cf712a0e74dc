/**
 * SLP Transfer Type Definitions
 *
 * Types shared by the selector, the assembler and the wallet collaborator.
 */

import type { HexString, LockingScript, TXIDHexString } from '@bsv/sdk'
import type { SLPLogger, LogLevel } from './logging.js'

// ---------------------------------------------------------------------------
// Wallet snapshot types
// ---------------------------------------------------------------------------

/**
 * Token annotation carried by an output that holds token balance.
 */
export interface TokenAnnotation {
  /** Token id (genesis txid, 64 hex characters) */
  tokenId: string
  /** Raw token amount in the token's smallest unit */
  amount: bigint
}

/**
 * An unspent output from the wallet's spendable set.
 */
export interface SpendableOutput {
  /** Transaction ID of the output */
  txid: TXIDHexString
  /** Output index */
  outputIndex: number
  /** Value in satoshis */
  satoshis: number
  /** Owning address, if the wallet knows it */
  address?: string
  /** Locking script hex, needed by signers that do not look up source transactions */
  lockingScript?: HexString
  /** Present when the output carries token balance */
  token?: TokenAnnotation
}

/**
 * Per-token metadata.
 */
export interface TokenDescriptor {
  tokenId: string
  /** Fixed for the lifetime of the token; scales raw amounts */
  decimals: number
  /** Display only */
  ticker: string
}

/**
 * Human decimal amount. Strings keep full precision; numbers are accepted
 * for convenience and read through their shortest decimal rendering.
 */
export type DecimalAmount = string | number | bigint

// ---------------------------------------------------------------------------
// Selection and assembly types
// ---------------------------------------------------------------------------

/**
 * Result of the token-aware UTXO selection.
 */
export interface SelectionResult {
  tokenId: string
  /** Consumed outputs, token pass first, in selection order */
  selected: SpendableOutput[]
  /**
   * Quantities for the metadata output. The first entry goes to the
   * receiver; a second entry is token change back to the sender.
   */
  quantities: bigint[]
  /** Currency change owed to the sender (may be below dust) */
  changeSatoshis: number
  /** Satoshis that must land in non-change outputs */
  sendSatoshis: number
  /** Estimated fee */
  fee: number
  /** Token amount consumed */
  inputTokens: bigint
  /** Satoshis consumed, net of the per-input deduction */
  inputSatoshis: number
}

export type PlannedOutputKind = 'metadata' | 'receiver' | 'token-change' | 'currency-change'

export interface PlannedOutput {
  kind: PlannedOutputKind
  satoshis: number
  lockingScript: LockingScript
  /** Destination address; absent for the metadata output */
  address?: string
}

/**
 * Outputs and inputs of a transfer, fully resolved before any draft exists.
 */
export interface TransferPlan {
  outputs: PlannedOutput[]
  inputs: SpendableOutput[]
  /** Currency change below the dust limit, left to the fee */
  forfeitedSatoshis: number
}

// ---------------------------------------------------------------------------
// Collaborator types
// ---------------------------------------------------------------------------

/**
 * Transaction under construction, owned by the wallet collaborator.
 */
export interface DraftTransaction {
  addOutput(satoshis: number, lockingScript: LockingScript): void
  addInput(output: SpendableOutput): void
}

export interface SignedTransaction {
  txid: TXIDHexString
  rawTx: HexString
}

/**
 * Fresh address derivation. Every call derives a new address.
 */
export interface AddressSource {
  freshChangeAddress(): string
  freshTokenReceiveAddress(): string
}

/**
 * Capabilities the transfer builder needs from the surrounding wallet.
 */
export interface SLPWallet<D extends DraftTransaction = DraftTransaction> extends AddressSource {
  /** Point-in-time snapshot of the spendable set */
  spendableOutputs(): SpendableOutput[] | Promise<SpendableOutput[]>
  /** Descriptor for a token, or undefined if the wallet does not know it */
  tokenDescriptor(tokenId: string): TokenDescriptor | undefined | Promise<TokenDescriptor | undefined>
  createUnsignedTransaction(): D
  /** Signs without broadcasting */
  signOffline(draft: D): SignedTransaction | Promise<SignedTransaction>
  /** Address decoding; defaults to P2PKH when omitted */
  lockingScriptFor?(address: string): LockingScript
}

// ---------------------------------------------------------------------------
// Configuration types
// ---------------------------------------------------------------------------

export interface FeePolicy {
  dustLimit: number
  inputCost: number
  outputCost: number
  opReturnBaseSize: number
  quantitySize: number
  propagationSlack: number
}

export interface SLPConfig<D extends DraftTransaction = DraftTransaction> {
  /** Wallet collaborator */
  wallet: SLPWallet<D>
  /** Overrides for fee constants (validated) */
  feePolicy?: Partial<FeePolicy>
  /** Logger (default: console logger at the configured level) */
  logger?: SLPLogger
  /** Minimum level for the default logger */
  logLevel?: LogLevel
}

export interface ResolvedSLPConfig<D extends DraftTransaction = DraftTransaction> {
  wallet: SLPWallet<D>
  feePolicy: FeePolicy
  logger: SLPLogger
}
