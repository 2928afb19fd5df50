import { utils } from 'ethers'
import { ACCOUNTS, CallMode, ZERO_ADDRESS } from '../../common/constants'
import { TokenCaller } from '../adapter/TokenCaller'
import { CallOutcome, CallSpec, Scenario, SetupCall, Snapshot, SubjectFactory } from '../interface'
import { Property, Violation } from '../properties/types'

export type Observed = {
  outcome: CallOutcome
  pre: Snapshot
  post: Snapshot
}

export type Discarded = { status: 'discarded'; reason: string }
export type Held = Observed & { status: 'held' }
export type Violated = Observed & { status: 'violated'; violation: Violation }

export type Evaluation = Discarded | Held | Violated

/*
 * One deterministic evaluation of a scenario against a fresh subject:
 * setup, pre-snapshot, precondition, call, post-snapshot, check.
 *
 * A candidate is discarded when a setup call fails (unless the property tolerates it), when the
 * precondition is false, or when a typed call under test reverts. Errors that are not reverts
 * escape.
 */
export async function evaluate<C extends CallSpec>(
  property: Property<C>,
  factory: SubjectFactory,
  scenario: Scenario<C>
): Promise<Evaluation> {
  const caller = new TokenCaller(factory())

  for (const [i, step] of scenario.setup.entries()) {
    const outcome = await caller.setup(step)
    if (failed(outcome) && !property.tolerateSetupFailures) {
      return { status: 'discarded', reason: `setup step ${i} (${step.op}) failed` }
    }
  }

  const universe = universeOf(scenario)
  const pre = await caller.snapshot(universe)
  if (property.precondition && !property.precondition(scenario, pre)) {
    return { status: 'discarded', reason: 'precondition does not hold' }
  }

  const outcome = await caller.invoke(scenario.call, property.mode)
  if (property.mode === CallMode.TYPED && outcome.status === 'reverted') {
    return { status: 'discarded', reason: `typed call reverted: ${outcome.reason}` }
  }

  const post = await caller.snapshot(universe)
  const violation = property.check({ scenario, pre, outcome, post })
  if (violation) return { status: 'violated', violation, outcome, pre, post }
  return { status: 'held', outcome, pre, post }
}

// A setup call fails when it reverts or completes with `false`
const failed = (outcome: CallOutcome): boolean =>
  outcome.status === 'reverted' || outcome.result === false

// Canonical accounts, the null address and every address the scenario names, checksummed
export function universeOf(scenario: Scenario): string[] {
  const addresses = [
    ...ACCOUNTS,
    ZERO_ADDRESS,
    ...scenario.setup.flatMap(addressesOf),
    ...addressesOf(scenario.call),
  ]
  return [...new Set(addresses.map((a) => utils.getAddress(a)))]
}

function addressesOf(call: SetupCall | CallSpec): string[] {
  switch (call.op) {
    case 'mint':
      return [call.to]
    case 'transfer':
      return [call.sender, call.to]
    case 'transferFrom':
      return [call.sender, call.from, call.to]
    case 'approve':
      return [call.sender, call.spender]
    case 'balanceOf':
      return [call.account]
    case 'allowance':
      return [call.owner, call.spender]
    case 'totalSupply':
      return []
  }
}
