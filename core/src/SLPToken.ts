/**
 * SLPToken - SEND Metadata Encoding and Decoding
 *
 * A transfer carries its token semantics in a zero-value OP_RETURN output:
 *
 * Push 0: lokad id "SLP\0"
 * Push 1: token type (0x01)
 * Push 2: "SEND"
 * Push 3: token id (32 bytes)
 * Push 4..: one 8-byte big-endian quantity per token-receiving output
 *
 * Quantity N is assigned to transaction output N + 1 (output 0 is the
 * metadata output itself).
 */

import { LockingScript, OP, Utils } from '@bsv/sdk'

import {
  SLP_LOKAD_ID,
  SLP_TOKEN_TYPE,
  SEND_MARKER,
  TOKEN_ID_BYTES,
  QUANTITY_BYTES,
  MAX_SEND_QUANTITIES,
  MAX_RAW_AMOUNT
} from './constants.js'
import { InvalidAmountError, InvalidTokenIdError } from './errors.js'

export interface DecodedSend {
  valid: true
  tokenId: string
  quantities: bigint[]
}

export interface InvalidSend {
  valid: false
  error: string
}

export type SendDecodeResult = DecodedSend | InvalidSend

type Chunk = { op: number; data?: number[] }

const OP_PUSHDATA1 = 0x4c

/**
 * SLPToken handles the SEND metadata output.
 *
 * @example
 * ```typescript
 * const script = SLPToken.encodeSend(tokenId, [150000000n, 50000000n])
 * const decoded = SLPToken.decodeSend(script)
 * ```
 */
export class SLPToken {
  /**
   * Build the metadata locking script for a transfer.
   *
   * @param tokenId - Token id, 64 hex characters
   * @param quantities - Raw amounts for outputs 1..n; must be non-empty
   */
  static encodeSend(tokenId: string, quantities: readonly bigint[]): LockingScript {
    if (!SLPToken.isValidTokenId(tokenId)) {
      throw new InvalidTokenIdError(tokenId)
    }
    if (quantities.length < 1 || quantities.length > MAX_SEND_QUANTITIES) {
      throw new InvalidAmountError(
        `A SEND carries between 1 and ${MAX_SEND_QUANTITIES} quantities`,
        quantities.length
      )
    }

    const chunks: Chunk[] = [
      { op: OP.OP_RETURN },
      push(SLP_LOKAD_ID),
      push([SLP_TOKEN_TYPE]),
      push(Utils.toArray(SEND_MARKER, 'utf8')),
      push(Utils.toArray(tokenId.toLowerCase(), 'hex'))
    ]
    for (const quantity of quantities) {
      chunks.push(push(SLPToken.quantityToBytes(quantity)))
    }
    return new LockingScript(chunks)
  }

  /**
   * Decode a SEND metadata script.
   *
   * @param lockingScript - The locking script (hex string or LockingScript)
   * @returns Decoded token id and quantities, or an invalid result
   */
  static decodeSend(lockingScript: string | LockingScript): SendDecodeResult {
    try {
      const script = typeof lockingScript === 'string'
        ? LockingScript.fromHex(lockingScript)
        : lockingScript
      const pushes = readPushes(script.toBinary())
      if (pushes === undefined) {
        return { valid: false, error: 'Not an OP_RETURN script of data pushes' }
      }

      if (pushes.length < 5) {
        return { valid: false, error: `Invalid push count: expected at least 5, got ${pushes.length}` }
      }
      const [lokad, tokenType, marker, tokenIdBytes, ...quantityPushes] = pushes

      if (Utils.toHex(lokad) !== Utils.toHex(SLP_LOKAD_ID)) {
        return { valid: false, error: 'Missing SLP lokad id' }
      }
      if (tokenType.length !== 1 || tokenType[0] !== SLP_TOKEN_TYPE) {
        return { valid: false, error: `Unsupported token type: ${Utils.toHex(tokenType)}` }
      }
      if (Utils.toUTF8(marker) !== SEND_MARKER) {
        return { valid: false, error: `Unsupported transaction type: ${Utils.toUTF8(marker)}` }
      }
      if (tokenIdBytes.length !== TOKEN_ID_BYTES) {
        return { valid: false, error: `Invalid token id length: ${tokenIdBytes.length}` }
      }
      if (quantityPushes.length > MAX_SEND_QUANTITIES) {
        return { valid: false, error: `Too many quantities: ${quantityPushes.length}` }
      }
      if (quantityPushes.some(q => q.length !== QUANTITY_BYTES)) {
        return { valid: false, error: `Quantities must be ${QUANTITY_BYTES} bytes` }
      }

      return {
        valid: true,
        tokenId: Utils.toHex(tokenIdBytes),
        quantities: quantityPushes.map(bytesToQuantity)
      }
    } catch (error) {
      return {
        valid: false,
        error: error instanceof Error ? error.message : 'Failed to decode metadata'
      }
    }
  }

  /**
   * Check if a string is a valid token id (64 hex characters)
   */
  static isValidTokenId(tokenId: string): boolean {
    return /^[a-fA-F0-9]{64}$/.test(tokenId)
  }

  /**
   * Encode a raw amount as 8 big-endian bytes.
   */
  static quantityToBytes(quantity: bigint): number[] {
    if (quantity < 0n || quantity > MAX_RAW_AMOUNT) {
      throw new InvalidAmountError(`Quantity must be in [0, ${MAX_RAW_AMOUNT}]`, quantity)
    }
    const bytes: number[] = []
    for (let shift = BigInt((QUANTITY_BYTES - 1) * 8); shift >= 0n; shift -= 8n) {
      bytes.push(Number((quantity >> shift) & 0xffn))
    }
    return bytes
  }
}

// ---------------------------------------------------------------------------
// Script helpers
// ---------------------------------------------------------------------------

function push(data: number[]): Chunk {
  return { op: data.length <= 75 ? data.length : OP_PUSHDATA1, data }
}

function bytesToQuantity(bytes: number[]): bigint {
  return bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n)
}

/**
 * Split serialized `OP_RETURN <push>...` into push payloads. Returns
 * undefined for anything else, including non-push opcodes after OP_RETURN.
 */
function readPushes(bin: number[]): number[][] | undefined {
  if (bin.length === 0 || bin[0] !== OP.OP_RETURN) return undefined

  const pushes: number[][] = []
  let pos = 1
  while (pos < bin.length) {
    const op = bin[pos++]
    let length: number
    if (op >= 1 && op <= 75) {
      length = op
    } else if (op === OP_PUSHDATA1 && pos < bin.length) {
      length = bin[pos++]
    } else {
      return undefined
    }
    if (pos + length > bin.length) return undefined
    pushes.push(bin.slice(pos, pos + length))
    pos += length
  }
  return pushes
}
