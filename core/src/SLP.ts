/**
 * SLP - token transfer builder
 *
 * Main entry point. Looks up the token, encodes the amount, selects inputs
 * from a snapshot of the wallet, assembles the draft and has the wallet
 * sign it offline.
 */

import { fromRawAmount, toRawAmount } from './amounts.js'
import { assembleTransfer } from './assembly.js'
import { resolveConfig } from './config.js'
import { SLPError, UnknownTokenError, InvalidTokenIdError } from './errors.js'
import { SLPToken } from './SLPToken.js'
import { selectTokenUtxos, validateSpendableOutputs } from './selection.js'
import { outpointOf, sumTokenAmounts } from './utils.js'
import type {
  DecimalAmount,
  DraftTransaction,
  ResolvedSLPConfig,
  SelectionResult,
  SignedTransaction,
  SLPConfig,
  TokenDescriptor
} from './types.js'

/**
 * @example
 * ```typescript
 * const slp = new SLP({ wallet })
 *
 * // Build and sign a transfer of 1.5 tokens
 * const signed = await slp.buildTransfer(tokenId, '1.5', recipientAddress)
 * console.log('txid:', signed.txid)
 *
 * // Spendable balance as decimal text
 * const balance = await slp.getBalance(tokenId)
 * ```
 */
export class SLP<D extends DraftTransaction = DraftTransaction> {
  private config: ResolvedSLPConfig<D>

  constructor(config: SLPConfig<D>) {
    this.config = resolveConfig(config)
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  /**
   * Build and sign a token transfer.
   *
   * Nothing is broadcast. On any failure no draft is handed to the signer.
   *
   * @param tokenId - Token to send
   * @param amount - Decimal amount in whole tokens
   * @param toAddress - Receiver address
   * @returns The signed transaction
   * @throws SLPError subclass describing the failure
   */
  async buildTransfer(tokenId: string, amount: DecimalAmount, toAddress: string): Promise<SignedTransaction> {
    const { wallet, feePolicy, logger } = this.config
    try {
      const selection = await this.selectUtxos(tokenId, amount)
      const { draft, plan } = assembleTransfer(selection, toAddress, wallet, feePolicy)

      const signed = await wallet.signOffline(draft)
      logger.info('Signed token transfer', {
        txid: signed.txid,
        tokenId: selection.tokenId,
        quantities: selection.quantities,
        inputs: plan.inputs.map(outpointOf),
        fee: selection.fee,
        forfeitedSatoshis: plan.forfeitedSatoshis
      })
      return signed
    } catch (error) {
      const slpError = SLPError.fromUnknown(error)
      logger.warn('Token transfer failed', { tokenId, code: slpError.code, message: slpError.message })
      throw slpError
    }
  }

  /**
   * Run input selection for a transfer without assembling it.
   */
  async selectUtxos(tokenId: string, amount: DecimalAmount): Promise<SelectionResult> {
    const descriptor = await this.getTokenDescriptor(tokenId)
    const sendTokensRaw = toRawAmount(amount, descriptor)
    const utxos = await this.config.wallet.spendableOutputs()

    const selection = selectTokenUtxos(descriptor.tokenId, sendTokensRaw, utxos, this.config.feePolicy)
    this.config.logger.debug('Selected inputs', {
      tokenId: descriptor.tokenId,
      selected: selection.selected.length,
      quantities: selection.quantities,
      changeSatoshis: selection.changeSatoshis
    })
    return selection
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Spendable token balance as decimal text.
   */
  async getBalance(tokenId: string): Promise<string> {
    const descriptor = await this.getTokenDescriptor(tokenId)
    const utxos = await this.config.wallet.spendableOutputs()
    validateSpendableOutputs(utxos)
    return fromRawAmount(sumTokenAmounts(utxos, descriptor.tokenId), descriptor)
  }

  /**
   * Token ids are looked up in lowercase; the returned descriptor carries
   * the normalized id.
   *
   * @throws InvalidTokenIdError for malformed ids
   * @throws UnknownTokenError when the wallet has no descriptor for the token
   */
  async getTokenDescriptor(tokenId: string): Promise<TokenDescriptor> {
    if (!SLPToken.isValidTokenId(tokenId)) {
      throw new InvalidTokenIdError(tokenId)
    }
    const normalized = tokenId.toLowerCase()
    const descriptor = await this.config.wallet.tokenDescriptor(normalized)
    if (descriptor === undefined) {
      throw new UnknownTokenError(normalized)
    }
    return { ...descriptor, tokenId: normalized }
  }
}
