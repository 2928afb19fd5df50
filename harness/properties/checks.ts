import { BigNumber } from 'ethers'
import { Diagnosis } from '../../common/constants'
import { shortAmount } from '../../common/numbers'
import { CallOutcome, Snapshot, allowanceKey } from '../interface'
import { Violation } from './types'

export const violation = (message: string): Violation => ({
  kind: Diagnosis.VIOLATION,
  message,
})

export const completedFalse = (message: string): Violation => ({
  kind: Diagnosis.COMPLETED_FALSE,
  message,
})

// First violation in argument order
export const firstOf = (...checks: (() => Violation | undefined)[]): Violation | undefined => {
  for (const check of checks) {
    const found = check()
    if (found) return found
  }
  return undefined
}

// Snapshot lookups. The universe covers every address a scenario names, so a miss is a harness bug.

export function balanceIn(snapshot: Snapshot, account: string): BigNumber {
  const value = snapshot.balances.get(account)
  if (!value) throw new Error(`${account} is outside the snapshot universe`)
  return value
}

export function allowanceIn(snapshot: Snapshot, owner: string, spender: string): BigNumber {
  const value = snapshot.allowances.get(allowanceKey(owner, spender))
  if (!value) throw new Error(`${owner} -> ${spender} is outside the snapshot universe`)
  return value
}

// Outcomes

export function expectReverted(outcome: CallOutcome, what: string): Violation | undefined {
  if (outcome.status === 'reverted') return undefined
  if (outcome.result === false) return completedFalse(`${what} returned false instead of reverting`)
  if (outcome.result === undefined) {
    return violation(`${what} completed without return data instead of reverting`)
  }
  return violation(`${what} completed instead of reverting`)
}

// No revert required, but a completed call must return true
export function expectTrueIfCompleted(outcome: CallOutcome, what: string): Violation | undefined {
  if (outcome.status === 'reverted') return undefined
  if (outcome.result === false) return completedFalse(`${what} completed and returned false`)
  if (outcome.result === undefined) return violation(`${what} completed without return data`)
  return undefined
}

export function expectCompletedTrue(outcome: CallOutcome, what: string): Violation | undefined {
  if (outcome.status === 'reverted') return violation(`${what} reverted: ${outcome.reason}`)
  return expectTrueIfCompleted(outcome, what)
}

export function expectReadValue(
  outcome: CallOutcome,
  what: string,
  expected: BigNumber
): Violation | undefined {
  if (outcome.status === 'reverted') return violation(`${what} reverted: ${outcome.reason}`)
  if (!outcome.value) return violation(`${what} completed without return data`)
  if (!outcome.value.eq(expected)) {
    return violation(
      `${what} returned ${shortAmount(outcome.value)}, state holds ${shortAmount(expected)}`
    )
  }
  return undefined
}

// Snapshots

export function expectAmount(
  what: string,
  actual: BigNumber,
  expected: BigNumber
): Violation | undefined {
  if (actual.eq(expected)) return undefined
  return violation(`${what} is ${shortAmount(actual)}, expected ${shortAmount(expected)}`)
}

export type Unchanged = {
  balances?: readonly string[]
  allowances?: readonly [string, string][]
  totalSupply?: boolean
}

// Everything in `post` equals `pre`, apart from the listed exceptions
export function expectUnchanged(
  pre: Snapshot,
  post: Snapshot,
  except: Unchanged = {}
): Violation | undefined {
  if (!except.totalSupply && !post.totalSupply.eq(pre.totalSupply)) {
    return violation(
      `totalSupply changed from ${shortAmount(pre.totalSupply)} to ${shortAmount(post.totalSupply)}`
    )
  }

  const skipBalances = new Set(except.balances ?? [])
  for (const [account, before] of pre.balances) {
    if (skipBalances.has(account)) continue
    const after = balanceIn(post, account)
    if (!after.eq(before)) {
      return violation(
        `balance of ${account} changed from ${shortAmount(before)} to ${shortAmount(after)}`
      )
    }
  }

  const skipAllowances = new Set(
    (except.allowances ?? []).map(([owner, spender]) => allowanceKey(owner, spender))
  )
  for (const [key, before] of pre.allowances) {
    if (skipAllowances.has(key)) continue
    const after = post.allowances.get(key)
    if (!after || !after.eq(before)) {
      return violation(
        `allowance ${key} changed from ${shortAmount(before)} to ${after ? shortAmount(after) : 'nothing'}`
      )
    }
  }
  return undefined
}

export const sumOfBalances = (snapshot: Snapshot): BigNumber =>
  [...snapshot.balances.values()].reduce((sum, b) => sum.add(b), BigNumber.from(0))
