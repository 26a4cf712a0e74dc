import { DEFAULT_FEE_POLICY, readEnvSettings, resolveConfig, resolveFeePolicy } from '../config.js'
import { InvalidConfigError, SLPError, SLPErrorCodes } from '../errors.js'
import type { SLPLogger } from '../logging.js'
import type { DraftTransaction, SLPWallet } from '../types.js'

const wallet: SLPWallet<DraftTransaction> = {
  spendableOutputs: () => [],
  tokenDescriptor: () => undefined,
  freshChangeAddress: () => 'change',
  freshTokenReceiveAddress: () => 'token-change',
  createUnsignedTransaction: () => ({ addOutput: () => {}, addInput: () => {} }),
  signOffline: async () => ({ txid: '00'.repeat(32), rawTx: '00' })
}

describe('config', () => {
  it('should default to the protocol constants', () => {
    expect(DEFAULT_FEE_POLICY).toEqual({
      dustLimit: 546,
      inputCost: 148,
      outputCost: 34,
      opReturnBaseSize: 55,
      quantitySize: 9,
      propagationSlack: 50
    })
  })

  it('should reject negative fee settings', () => {
    expect(() => resolveFeePolicy({ inputCost: -1 })).toThrow(InvalidConfigError)
    expect(() => resolveFeePolicy({ dustLimit: 0 })).toThrow(expect.objectContaining({
      code: SLPErrorCodes.INVALID_CONFIG,
      context: expect.objectContaining({ source: 'feePolicy', path: 'dustLimit' })
    }))
  })

  it('should read levels and fee settings from the environment', () => {
    expect(readEnvSettings({ SLP_LOG_LEVEL: 'debug', SLP_PROPAGATION_SLACK: '10' })).toEqual({
      SLP_LOG_LEVEL: 'debug',
      SLP_PROPAGATION_SLACK: 10
    })
    expect(readEnvSettings({})).toEqual({ SLP_LOG_LEVEL: 'info' })
  })

  it('should reject an unknown log level', () => {
    expect(() => readEnvSettings({ SLP_LOG_LEVEL: 'verbose' })).toThrow(InvalidConfigError)
  })

  it('should report bad settings as library errors from resolveConfig', () => {
    let thrown: unknown
    try {
      resolveConfig({ wallet }, { SLP_LOG_LEVEL: 'INFO' })
    } catch (error) {
      thrown = error
    }
    expect(thrown).toBeInstanceOf(SLPError)
    expect(thrown).toEqual(expect.objectContaining({
      code: SLPErrorCodes.INVALID_CONFIG,
      context: expect.objectContaining({ source: 'env', path: 'SLP_LOG_LEVEL' })
    }))

    expect(() => resolveConfig({ wallet, feePolicy: { dustLimit: 0 } }, {})).toThrow(InvalidConfigError)
    expect(() => resolveConfig({ wallet }, { SLP_DUST_LIMIT: 'lots' })).toThrow(
      expect.objectContaining({ context: expect.objectContaining({ path: 'SLP_DUST_LIMIT' }) })
    )
  })

  it('should apply environment fee settings', () => {
    const resolved = resolveConfig({ wallet }, { SLP_PROPAGATION_SLACK: '10', SLP_DUST_LIMIT: '600' })
    expect(resolved.feePolicy.propagationSlack).toBe(10)
    expect(resolved.feePolicy.dustLimit).toBe(600)
    expect(resolved.feePolicy.inputCost).toBe(148)
  })

  it('should let explicit options win over the environment', () => {
    const logger: SLPLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    const resolved = resolveConfig(
      { wallet, logger, feePolicy: { propagationSlack: 0 } },
      { SLP_PROPAGATION_SLACK: '10' }
    )
    expect(resolved.feePolicy.propagationSlack).toBe(0)
    expect(resolved.logger).toBe(logger)
    expect(resolved.wallet).toBe(wallet)
  })
})
