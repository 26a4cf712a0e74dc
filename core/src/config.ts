/**
 * Configuration resolution.
 *
 * Explicit options win over environment settings, which win over the
 * protocol defaults in constants.ts.
 */

import { z } from 'zod'

import {
  DUST_LIMIT,
  INPUT_COST,
  OUTPUT_COST,
  OP_RETURN_BASE_SIZE,
  QUANTITY_SIZE,
  PROPAGATION_SLACK
} from './constants.js'
import { InvalidConfigError } from './errors.js'
import { createLogger } from './logging.js'
import type { LogLevel } from './logging.js'
import type { DraftTransaction, FeePolicy, ResolvedSLPConfig, SLPConfig } from './types.js'

const size = z.number().int().nonnegative()

export const FeePolicySchema = z.object({
  dustLimit: z.number().int().positive().default(DUST_LIMIT),
  inputCost: size.default(INPUT_COST),
  outputCost: size.default(OUTPUT_COST),
  opReturnBaseSize: size.default(OP_RETURN_BASE_SIZE),
  quantitySize: size.default(QUANTITY_SIZE),
  propagationSlack: size.default(PROPAGATION_SLACK)
})

export const DEFAULT_FEE_POLICY: FeePolicy = FeePolicySchema.parse({})

const EnvSchema = z.object({
  SLP_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  SLP_DUST_LIMIT: z.coerce.number().int().positive().optional(),
  SLP_PROPAGATION_SLACK: z.coerce.number().int().nonnegative().optional()
})

export type EnvSettings = z.infer<typeof EnvSchema>

/**
 * Read settings from the environment. Unset variables fall back to defaults.
 *
 * @throws InvalidConfigError naming the first bad variable
 */
export function readEnvSettings(env: Record<string, string | undefined> = process.env): EnvSettings {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidConfigError('env', issue.path.join('.'), issue.message)
  }
  return parsed.data
}

/**
 * Merge fee overrides with the defaults and validate the result.
 *
 * @throws InvalidConfigError naming the first bad field
 */
export function resolveFeePolicy(overrides: Partial<FeePolicy> = {}): FeePolicy {
  const parsed = FeePolicySchema.safeParse(overrides)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidConfigError('feePolicy', issue.path.join('.'), issue.message)
  }
  return parsed.data
}

export function resolveConfig<D extends DraftTransaction>(
  config: SLPConfig<D>,
  env: Record<string, string | undefined> = process.env
): ResolvedSLPConfig<D> {
  const settings = readEnvSettings(env)
  const logLevel: LogLevel = config.logLevel ?? settings.SLP_LOG_LEVEL

  const fromEnv: Partial<FeePolicy> = {}
  if (settings.SLP_DUST_LIMIT !== undefined) fromEnv.dustLimit = settings.SLP_DUST_LIMIT
  if (settings.SLP_PROPAGATION_SLACK !== undefined) fromEnv.propagationSlack = settings.SLP_PROPAGATION_SLACK

  return {
    wallet: config.wallet,
    feePolicy: resolveFeePolicy({ ...fromEnv, ...config.feePolicy }),
    logger: config.logger ?? createLogger('slp', logLevel)
  }
}
