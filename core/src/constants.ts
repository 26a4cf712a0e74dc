/**
 * SLP Protocol Constants
 *
 * Constants used by the transfer builder. Size constants model byte
 * footprints at a fee rate of one satoshi per byte.
 */

// ---------------------------------------------------------------------------
// Protocol Constants
// ---------------------------------------------------------------------------

/** Lokad prefix pushed first in every SLP metadata output ("SLP\0") */
export const SLP_LOKAD_ID = [0x53, 0x4c, 0x50, 0x00]

/** Fungible token type */
export const SLP_TOKEN_TYPE = 0x01

/** Transaction type literal for transfers */
export const SEND_MARKER = 'SEND'

/** Token ids are 32-byte transaction ids rendered as hex */
export const TOKEN_ID_BYTES = 32

/** Each quantity is an 8-byte big-endian unsigned integer */
export const QUANTITY_BYTES = 8

/** A SEND may assign quantities to at most 19 outputs */
export const MAX_SEND_QUANTITIES = 19

// ---------------------------------------------------------------------------
// Amount Constants
// ---------------------------------------------------------------------------

/** Largest raw token amount (2^64 - 1) */
export const MAX_RAW_AMOUNT = (1n << 64n) - 1n

/** Largest supported decimals value for a token descriptor */
export const MAX_TOKEN_DECIMALS = 255

// ---------------------------------------------------------------------------
// Fee Constants
// ---------------------------------------------------------------------------

/** Smallest output value peers consider spendable */
export const DUST_LIMIT = 546

/** Size charged against every consumed input (signature + public key + outpoint) */
export const INPUT_COST = 148

/** Size of one standard output */
export const OUTPUT_COST = 34

/** Size of the metadata output before any quantity is added */
export const OP_RETURN_BASE_SIZE = 55

/** Size added to the metadata output per quantity */
export const QUANTITY_SIZE = 9

/** Fee slack on top of the estimate; transactions at exactly 1 sat/byte relay poorly */
export const PROPAGATION_SLACK = 50

/**
 * Outputs assumed when estimating the fee besides the metadata output:
 * receiver, token change and currency change.
 */
export const ASSUMED_OUTPUTS = 3
