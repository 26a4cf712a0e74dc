/**
 * Utility functions for SLP transfers
 */

import { LockingScript, P2PKH } from '@bsv/sdk'

import { AddressDecodeFailureError } from './errors.js'
import type { SpendableOutput } from './types.js'

/**
 * Decode a base58check P2PKH address into its locking script.
 *
 * @throws AddressDecodeFailureError if the address is malformed or not P2PKH
 */
export function lockingScriptForAddress(address: string): LockingScript {
  try {
    return new P2PKH().lock(address)
  } catch (error) {
    throw new AddressDecodeFailureError(address, error instanceof Error ? error.message : 'Unknown error')
  }
}

/**
 * Run an address decoder supplied by a collaborator, normalizing its
 * failures to AddressDecodeFailureError.
 */
export function decodeAddressWith(decode: (address: string) => LockingScript, address: string): LockingScript {
  try {
    return decode(address)
  } catch (error) {
    if (error instanceof AddressDecodeFailureError) throw error
    throw new AddressDecodeFailureError(address, error instanceof Error ? error.message : 'Unknown error')
  }
}

/** Outpoint in "txid.outputIndex" format */
export function outpointOf(output: Pick<SpendableOutput, 'txid' | 'outputIndex'>): string {
  return `${output.txid}.${output.outputIndex}`
}

/** Token ids are hex, compared without regard to case */
export function sameTokenId(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

/** Sum of raw token amounts held by `outputs` for `tokenId` */
export function sumTokenAmounts(outputs: readonly SpendableOutput[], tokenId: string): bigint {
  let sum = 0n
  for (const { token } of outputs) {
    if (token !== undefined && sameTokenId(token.tokenId, tokenId)) sum += token.amount
  }
  return sum
}

/** Sum of satoshi values */
export function sumSatoshis(outputs: ReadonlyArray<{ satoshis: number }>): number {
  return outputs.reduce((sum, o) => sum + o.satoshis, 0)
}
