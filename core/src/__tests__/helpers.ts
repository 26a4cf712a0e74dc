/**
 * Shared fixtures for the transfer builder tests.
 */

import type { LockingScript, TXIDHexString } from '@bsv/sdk'
import type { DraftTransaction, SpendableOutput, TokenDescriptor } from '../types.js'

export const TOKEN_ID = 'ab'.repeat(32)
export const OTHER_TOKEN_ID = 'cd'.repeat(32)

export function txid(n: number): TXIDHexString {
  return n.toString(16).padStart(64, '0')
}

export function descriptor(decimals: number, tokenId: string = TOKEN_ID): TokenDescriptor {
  return { tokenId, decimals, ticker: 'TST' }
}

export function tokenUtxo(n: number, amount: bigint, satoshis: number, tokenId: string = TOKEN_ID): SpendableOutput {
  return { txid: txid(n), outputIndex: 1, satoshis, token: { tokenId, amount } }
}

export function plainUtxo(n: number, satoshis: number): SpendableOutput {
  return { txid: txid(n), outputIndex: 0, satoshis }
}

/**
 * Draft that records what the assembler writes.
 */
export class RecordingDraft implements DraftTransaction {
  outputs: Array<{ satoshis: number; lockingScript: LockingScript }> = []
  inputs: SpendableOutput[] = []

  addOutput(satoshis: number, lockingScript: LockingScript): void {
    this.outputs.push({ satoshis, lockingScript })
  }

  addInput(output: SpendableOutput): void {
    this.inputs.push(output)
  }
}
