import dotenv from 'dotenv'

dotenv.config()

export type IEnvVars =
  | 'PROPS_RUNS'
  | 'PROPS_SEED'
  | 'PROPS_TIME_LIMIT'
  | 'PROPS_EVAL_TIMEOUT'
  | 'PROPS_MAX_SKIPS'
  | 'PROPS_SUBJECT'

export function useEnv(key: IEnvVars | IEnvVars[], _default = ''): string {
  if (typeof key === 'string') {
    return process.env[key] || _default
  }
  for (const s of key) {
    const value = process.env[s]
    if (value) {
      return value
    }
  }
  return _default
}
