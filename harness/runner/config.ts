import { IEnvVars, useEnv } from '../../utils/env'
import { DEFAULT_RUN_OPTIONS, RunOptions } from './PropertyRunner'

export type RunnerConfig = Required<Omit<RunOptions, 'seed' | 'path' | 'log'>> & {
  seed?: number
  subject: string
}

function intFromEnv(key: IEnvVars, fallback: number): number {
  const raw = useEnv(key)
  if (raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`)
  }
  return value
}

export function loadRunnerConfig(): RunnerConfig {
  const seed = useEnv('PROPS_SEED')
  return {
    numRuns: intFromEnv('PROPS_RUNS', DEFAULT_RUN_OPTIONS.numRuns),
    timeLimitMs: intFromEnv('PROPS_TIME_LIMIT', DEFAULT_RUN_OPTIONS.timeLimitMs),
    evaluationTimeoutMs: intFromEnv('PROPS_EVAL_TIMEOUT', DEFAULT_RUN_OPTIONS.evaluationTimeoutMs),
    maxSkipsPerRun: intFromEnv('PROPS_MAX_SKIPS', DEFAULT_RUN_OPTIONS.maxSkipsPerRun),
    seed: seed === '' ? undefined : intFromEnv('PROPS_SEED', 0),
    subject: useEnv('PROPS_SUBJECT', 'ERC20Model'),
  }
}
