import fc from 'fast-check'
import { Diagnosis, Verdict } from '../../common/constants'
import { EvaluationTimeout, PropertyViolation } from '../errors'
import { CallOutcome, CallSpec, Scenario, Snapshot, SubjectFactory } from '../interface'
import { Property } from '../properties/types'
import { Evaluation, evaluate } from './evaluate'
import { formatResult } from './report'

export type RunOptions = {
  numRuns?: number
  seed?: number
  // fast-check replay path, as reported with a failure
  path?: string
  // whole property
  timeLimitMs?: number
  // single evaluation
  evaluationTimeoutMs?: number
  maxSkipsPerRun?: number
  log?: (line: string) => void
}

export const DEFAULT_RUN_OPTIONS = {
  numRuns: 100,
  timeLimitMs: 30_000,
  evaluationTimeoutMs: 2_000,
  maxSkipsPerRun: 50,
}

export type Witness<C extends CallSpec = CallSpec> = {
  scenario: Scenario<C>
  outcome: CallOutcome
  message: string
  pre: Snapshot
  post: Snapshot
}

export type PropertyResult = {
  id: string
  name: string
  verdict: Verdict
  diagnosis?: Diagnosis
  numRuns: number
  numSkips: number
  seed: number
  path?: string
  witness?: Witness
}

export async function runProperty<C extends CallSpec>(
  property: Property<C>,
  factory: SubjectFactory,
  options: RunOptions = {}
): Promise<PropertyResult> {
  const numRuns = options.numRuns ?? DEFAULT_RUN_OPTIONS.numRuns
  const timeLimitMs = options.timeLimitMs ?? DEFAULT_RUN_OPTIONS.timeLimitMs
  const evaluationTimeoutMs = options.evaluationTimeoutMs ?? DEFAULT_RUN_OPTIONS.evaluationTimeoutMs
  const maxSkipsPerRun = options.maxSkipsPerRun ?? DEFAULT_RUN_OPTIONS.maxSkipsPerRun
  let timedOut = false

  const predicate = fc.asyncProperty(property.scenario(), async (scenario) => {
    const evaluation = await within(
      evaluate(property, factory, scenario),
      evaluationTimeoutMs,
      property.id
    ).catch((e: unknown) => {
      if (e instanceof EvaluationTimeout) return undefined
      throw e
    })
    if (evaluation === undefined) {
      timedOut = true
      return fc.pre(false)
    }
    if (evaluation.status === 'discarded') return fc.pre(false)
    if (evaluation.status === 'violated') {
      const { kind, message } = evaluation.violation
      throw new PropertyViolation(property.id, kind, message)
    }
  })

  const details = await fc.check(predicate, {
    numRuns,
    seed: options.seed,
    path: options.path,
    interruptAfterTimeLimit: timeLimitMs,
    markInterruptAsFailure: false,
    maxSkipsPerRun,
  })

  const base = {
    id: property.id,
    name: property.name,
    numRuns: details.numRuns,
    numSkips: details.numSkips,
    seed: details.seed,
  }

  if (details.failed && details.counterexample !== null) {
    const error = details.errorInstance
    if (!(error instanceof PropertyViolation)) throw error
    const [scenario] = details.counterexample
    return {
      ...base,
      verdict: Verdict.FAIL,
      diagnosis: error.kind,
      path: details.counterexamplePath ?? undefined,
      witness: await witnessOf(property, factory, scenario, error.detail),
    }
  }

  // fast-check gave up: every candidate was skipped
  if (details.failed) {
    return {
      ...base,
      verdict: Verdict.INCONCLUSIVE,
      diagnosis: timedOut ? Diagnosis.TIMEOUT : Diagnosis.PRECONDITION_UNSATISFIABLE,
    }
  }

  if (details.interrupted || timedOut) {
    return { ...base, verdict: Verdict.INCONCLUSIVE, diagnosis: Diagnosis.TIMEOUT }
  }
  return { ...base, verdict: Verdict.PASS }
}

export async function runProperties(
  properties: readonly Property<CallSpec>[],
  factory: SubjectFactory,
  options: RunOptions = {}
): Promise<PropertyResult[]> {
  const results: PropertyResult[] = []
  for (const property of properties) {
    const result = await runProperty(property, factory, options)
    options.log?.(formatResult(result))
    results.push(result)
  }
  return results
}

// Re-evaluates a reported witness against a fresh subject
export async function replayWitness<C extends CallSpec>(
  property: Property<C>,
  factory: SubjectFactory,
  witness: Pick<Witness<C>, 'scenario'>
): Promise<Evaluation> {
  return evaluate(property, factory, witness.scenario)
}

async function witnessOf<C extends CallSpec>(
  property: Property<C>,
  factory: SubjectFactory,
  scenario: Scenario<C>,
  message: string
): Promise<Witness<C>> {
  const evaluation = await evaluate(property, factory, scenario)
  if (evaluation.status === 'discarded') {
    throw new Error(`${property.id}: shrunk counterexample did not replay (${evaluation.reason})`)
  }
  const { outcome, pre, post } = evaluation
  return { scenario, outcome, message, pre, post }
}

async function within<T>(work: Promise<T>, timeoutMs: number, propertyId: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EvaluationTimeout(propertyId, timeoutMs)), timeoutMs)
  })
  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}

