/**
 * Transaction assembly.
 *
 * Output order is fixed: metadata, receiver, token change, currency
 * change. The metadata quantities index into that order, so the receiver
 * must stay at output 1 and token change at output 2.
 */

import type { LockingScript } from '@bsv/sdk'

import { DEFAULT_FEE_POLICY } from './config.js'
import { MalformedSelectionError } from './errors.js'
import { SLPToken } from './SLPToken.js'
import { decodeAddressWith, lockingScriptForAddress, sumSatoshis, sumTokenAmounts } from './utils.js'
import type {
  AddressSource,
  DraftTransaction,
  FeePolicy,
  PlannedOutput,
  SelectionResult,
  SLPWallet,
  TransferPlan
} from './types.js'

export interface Addressing extends AddressSource {
  lockingScriptFor?(address: string): LockingScript
}

export type AssemblyTarget<D extends DraftTransaction> = Addressing & Pick<SLPWallet<D>, 'createUnsignedTransaction'>

/**
 * Resolve every output of a transfer to a locking script.
 *
 * Fresh addresses are only derived for outputs that will be emitted. The
 * receiver address is decoded first, so a bad destination fails before any
 * derivation index is consumed.
 *
 * @throws AddressDecodeFailureError if an address cannot be decoded
 * @throws MalformedSelectionError if the selection breaks its balance invariants
 */
export function planTransfer(
  selection: SelectionResult,
  toAddress: string,
  addressing: Addressing,
  policy: FeePolicy = DEFAULT_FEE_POLICY
): TransferPlan {
  const { quantities, changeSatoshis } = selection
  if (quantities.length < 1 || quantities.length > 2) {
    throw new MalformedSelectionError(`Expected 1 or 2 quantities, got ${quantities.length}`, {
      quantities: quantities.length
    })
  }
  const toScript = (address: string): LockingScript =>
    decodeAddressWith(addressing.lockingScriptFor?.bind(addressing) ?? lockingScriptForAddress, address)

  const receiverScript = toScript(toAddress)
  const outputs: PlannedOutput[] = [
    { kind: 'metadata', satoshis: 0, lockingScript: SLPToken.encodeSend(selection.tokenId, quantities) },
    { kind: 'receiver', satoshis: policy.dustLimit, lockingScript: receiverScript, address: toAddress }
  ]

  if (quantities.length === 2) {
    const address = addressing.freshTokenReceiveAddress()
    outputs.push({ kind: 'token-change', satoshis: policy.dustLimit, lockingScript: toScript(address), address })
  }

  let forfeitedSatoshis = 0
  if (changeSatoshis >= policy.dustLimit) {
    const address = addressing.freshChangeAddress()
    outputs.push({ kind: 'currency-change', satoshis: changeSatoshis, lockingScript: toScript(address), address })
  } else {
    forfeitedSatoshis = changeSatoshis
  }

  const plan: TransferPlan = { outputs, inputs: [...selection.selected], forfeitedSatoshis }
  assertBalanced(plan, selection, policy)
  return plan
}

/**
 * Check token conservation and currency balance of a plan.
 *
 * @throws MalformedSelectionError on any violation
 */
export function assertBalanced(
  plan: TransferPlan,
  selection: SelectionResult,
  policy: FeePolicy = DEFAULT_FEE_POLICY
): void {
  const inputTokens = sumTokenAmounts(plan.inputs, selection.tokenId)
  const outputTokens = selection.quantities.reduce((sum, q) => sum + q, 0n)
  if (inputTokens !== outputTokens) {
    throw new MalformedSelectionError('Token quantities do not match selected token inputs', {
      inputTokens,
      outputTokens
    })
  }

  if (selection.changeSatoshis < 0) {
    throw new MalformedSelectionError('Negative currency change', { changeSatoshis: selection.changeSatoshis })
  }

  const netInput = sumSatoshis(plan.inputs) - policy.inputCost * plan.inputs.length
  const outputTotal = sumSatoshis(plan.outputs)
  if (netInput !== outputTotal + selection.fee + plan.forfeitedSatoshis) {
    throw new MalformedSelectionError('Inputs do not cover outputs and fee', {
      netInput,
      outputTotal,
      fee: selection.fee,
      forfeitedSatoshis: plan.forfeitedSatoshis
    })
  }
}

/**
 * Plan the transfer and write it into a fresh draft from the wallet.
 * The draft is only created once the plan is complete and balanced.
 */
export function assembleTransfer<D extends DraftTransaction>(
  selection: SelectionResult,
  toAddress: string,
  target: AssemblyTarget<D>,
  policy: FeePolicy = DEFAULT_FEE_POLICY
): { draft: D; plan: TransferPlan } {
  const plan = planTransfer(selection, toAddress, target, policy)

  const draft = target.createUnsignedTransaction()
  for (const output of plan.outputs) {
    draft.addOutput(output.satoshis, output.lockingScript)
  }
  for (const input of plan.inputs) {
    draft.addInput(input)
  }
  return { draft, plan }
}
