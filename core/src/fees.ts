/**
 * Fee estimation in size units (bytes at 1 sat/byte).
 */

import { DEFAULT_FEE_POLICY } from './config.js'
import type { FeePolicy } from './types.js'

/** Cost of `numOutputs` standard outputs */
export function perOutputCost(numOutputs: number, policy: FeePolicy = DEFAULT_FEE_POLICY): number {
  return numOutputs * policy.outputCost
}

/**
 * Size of the metadata output, which grows with the number of token
 * quantities it carries (1 without token change, 2 with).
 */
export function metadataPayloadSize(numQuantities: number, policy: FeePolicy = DEFAULT_FEE_POLICY): number {
  return policy.opReturnBaseSize + numQuantities * policy.quantitySize
}

/**
 * Output-side fee for a transfer. Inputs are not counted here; the selector
 * charges `policy.inputCost` against each input's value instead.
 */
export function totalFee(numOutputs: number, numQuantities: number, policy: FeePolicy = DEFAULT_FEE_POLICY): number {
  return perOutputCost(numOutputs, policy) + metadataPayloadSize(numQuantities, policy) + policy.propagationSlack
}

/** Value an input contributes once its own size is paid for */
export function inputCredit(satoshis: number, policy: FeePolicy = DEFAULT_FEE_POLICY): number {
  return satoshis - policy.inputCost
}
