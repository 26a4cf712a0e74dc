import { Transaction } from '@bsv/sdk'
import type { HexString, LockingScript, TXIDHexString, ScriptTemplateUnlock } from '@bsv/sdk'

import type { DraftTransaction, SignedTransaction, SpendableOutput } from './types.js'

/**
 * Supplies the unlocking template for an input. This is where a wallet
 * plugs in its keys; the transfer builder never sees them.
 */
export type UnlockerFor = (output: SpendableOutput) => ScriptTemplateUnlock

/**
 * DraftTransaction backed by an `@bsv/sdk` Transaction.
 *
 * @example
 * ```typescript
 * const draft = new SdkDraftTransaction(output =>
 *   new P2PKH().unlock(key, 'all', false, output.satoshis, LockingScript.fromHex(output.lockingScript ?? ''))
 * )
 * ```
 */
export class SdkDraftTransaction implements DraftTransaction {
  readonly tx: Transaction
  private readonly unlockerFor: UnlockerFor

  constructor(unlockerFor: UnlockerFor, tx: Transaction = new Transaction()) {
    this.unlockerFor = unlockerFor
    this.tx = tx
  }

  addOutput(satoshis: number, lockingScript: LockingScript): void {
    this.tx.addOutput({ satoshis, lockingScript })
  }

  addInput(output: SpendableOutput): void {
    this.tx.addInput({
      sourceTXID: output.txid,
      sourceOutputIndex: output.outputIndex,
      unlockingScriptTemplate: this.unlockerFor(output),
      sequence: 0xffffffff
    })
  }

  /**
   * Sign every input offline. Nothing is broadcast.
   */
  async sign(): Promise<SignedTransaction> {
    await this.tx.sign()
    return {
      txid: this.tx.id('hex') as TXIDHexString,
      rawTx: this.tx.toHex() as HexString
    }
  }
}
