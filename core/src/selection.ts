/**
 * Token-aware UTXO selection.
 *
 * Two greedy passes, smallest first: token outputs until the requested
 * token amount is covered, then plain outputs until the dust outputs and
 * the fee are covered. Each input is credited its value minus the size of
 * the input itself.
 */

import { z } from 'zod'

import { ASSUMED_OUTPUTS, MAX_RAW_AMOUNT } from './constants.js'
import { DEFAULT_FEE_POLICY } from './config.js'
import {
  InsufficientCurrencyBalanceError,
  InsufficientTokenBalanceError,
  InvalidAmountError,
  InvalidSpendableOutputError
} from './errors.js'
import { inputCredit, totalFee } from './fees.js'
import { outpointOf, sameTokenId } from './utils.js'
import type { FeePolicy, SelectionResult, SpendableOutput } from './types.js'

const SpendableOutputSchema = z.object({
  txid: z.string().regex(/^[a-fA-F0-9]{64}$/, 'txid must be 64 hex characters'),
  outputIndex: z.number().int().nonnegative(),
  satoshis: z.number().int().nonnegative(),
  token: z.object({
    tokenId: z.string().min(1),
    amount: z.bigint().nonnegative().max(MAX_RAW_AMOUNT)
  }).optional()
})

/**
 * Validate a wallet snapshot entry by entry.
 *
 * @throws InvalidSpendableOutputError naming the first malformed or repeated entry
 */
export function validateSpendableOutputs(outputs: readonly SpendableOutput[]): void {
  const seen = new Set<string>()
  outputs.forEach((output, index) => {
    const parsed = SpendableOutputSchema.safeParse(output)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new InvalidSpendableOutputError(index, `${issue.path.join('.')}: ${issue.message}`)
    }
    // txids are hex, so the same outpoint may appear in either case
    const outpoint = outpointOf(output).toLowerCase()
    if (seen.has(outpoint)) {
      throw new InvalidSpendableOutputError(index, `duplicate outpoint ${outpointOf(output)}`)
    }
    seen.add(outpoint)
  })
}

const byTokenAmount = (a: SpendableOutput, b: SpendableOutput): number => {
  const x = a.token?.amount ?? 0n
  const y = b.token?.amount ?? 0n
  return x < y ? -1 : x > y ? 1 : 0
}

const bySatoshis = (a: SpendableOutput, b: SpendableOutput): number => a.satoshis - b.satoshis

/**
 * Select inputs for sending `sendTokensRaw` of `tokenId`.
 *
 * The snapshot is read, never modified. Outputs carrying any other token,
 * and outputs of the same token left over by the token pass, are never used
 * to pay for currency: spending them would burn their tokens.
 *
 * @param tokenId - Token to send
 * @param sendTokensRaw - Raw amount, already encoded by the amount codec
 * @param utxos - Snapshot of the wallet's spendable outputs
 * @param policy - Fee constants
 * @throws InsufficientTokenBalanceError if the token outputs cannot cover the amount
 * @throws InsufficientCurrencyBalanceError if dust outputs and fee cannot be paid
 */
export function selectTokenUtxos(
  tokenId: string,
  sendTokensRaw: bigint,
  utxos: readonly SpendableOutput[],
  policy: FeePolicy = DEFAULT_FEE_POLICY
): SelectionResult {
  if (sendTokensRaw <= 0n || sendTokensRaw > MAX_RAW_AMOUNT) {
    throw new InvalidAmountError('Token amount must be positive and fit in 8 unsigned bytes', sendTokensRaw)
  }
  validateSpendableOutputs(utxos)

  // At least one dust output to the token receiver
  let sendSatoshis = policy.dustLimit

  const selected: SpendableOutput[] = []
  let inputTokens = 0n
  let inputSatoshis = 0

  const tokenUtxos = utxos
    .filter(u => u.token !== undefined && sameTokenId(u.token.tokenId, tokenId))
    .sort(byTokenAmount)
  for (const utxo of tokenUtxos) {
    if (inputTokens >= sendTokensRaw) break
    selected.push(utxo)
    inputTokens += utxo.token?.amount ?? 0n
    inputSatoshis += inputCredit(utxo.satoshis, policy)
  }

  if (inputTokens < sendTokensRaw) {
    throw new InsufficientTokenBalanceError(tokenId, inputTokens, sendTokensRaw)
  }

  const quantities = [sendTokensRaw]
  const changeTokens = inputTokens - sendTokensRaw
  if (changeTokens > 0n) {
    quantities.push(changeTokens)
    // Token change needs its own dust output
    sendSatoshis += policy.dustLimit
  }

  const fee = totalFee(ASSUMED_OUTPUTS, quantities.length, policy)

  const plainUtxos = utxos
    .filter(u => u.token === undefined)
    .sort(bySatoshis)
  for (const utxo of plainUtxos) {
    if (inputSatoshis > sendSatoshis + fee) break
    selected.push(utxo)
    inputSatoshis += inputCredit(utxo.satoshis, policy)
  }

  const changeSatoshis = inputSatoshis - sendSatoshis - fee
  if (changeSatoshis < 0) {
    throw new InsufficientCurrencyBalanceError(inputSatoshis, sendSatoshis, fee)
  }

  return {
    tokenId,
    selected,
    quantities,
    changeSatoshis,
    sendSatoshis,
    fee,
    inputTokens,
    inputSatoshis
  }
}
