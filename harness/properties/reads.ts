import fc from 'fast-check'
import { CallMode, ZERO_ADDRESS } from '../../common/constants'
import { shortAmount } from '../../common/numbers'
import { anyAddress, history } from '../arbitraries'
import { AllowanceCall, BalanceOfCall, TotalSupplyCall } from '../interface'
import {
  allowanceIn,
  balanceIn,
  expectReadValue,
  expectUnchanged,
  firstOf,
  sumOfBalances,
  violation,
} from './checks'
import { allowance, balanceOf, totalSupply } from './scenarios'
import { Property } from './types'

// Reads run after an arbitrary history of standard calls, some of which revert.

export const totalSupplyIsPure: Property<TotalSupplyCall> = {
  id: 'ERC20-STDPROP-01',
  name: 'total-supply-is-pure',
  description: 'totalSupply() always succeeds, reports the stored supply and changes nothing',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () => fc.record({ setup: history(), call: fc.constant(totalSupply()) }),
  check: ({ pre, outcome, post }) =>
    firstOf(
      () => expectReadValue(outcome, 'totalSupply()', pre.totalSupply),
      () => expectUnchanged(pre, post)
    ),
}

export const balanceOfIsPure: Property<BalanceOfCall> = {
  id: 'ERC20-STDPROP-02',
  name: 'balance-of-is-pure',
  description: 'balanceOf(any) always succeeds, reports the stored balance and changes nothing',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () => fc.record({ setup: history(), call: anyAddress().map(balanceOf) }),
  check: ({ scenario: { call }, pre, outcome, post }) =>
    firstOf(
      () => expectReadValue(outcome, `balanceOf(${call.account})`, balanceIn(pre, call.account)),
      () => expectUnchanged(pre, post)
    ),
}

export const allowanceIsPure: Property<AllowanceCall> = {
  id: 'ERC20-STDPROP-03',
  name: 'allowance-is-pure',
  description: 'allowance(any, any) always succeeds, reports the stored value and changes nothing',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () =>
    fc.record({
      setup: history(),
      call: fc.tuple(anyAddress(), anyAddress()).map(([owner, spender]) => allowance(owner, spender)),
    }),
  check: ({ scenario: { call }, pre, outcome, post }) =>
    firstOf(
      () =>
        expectReadValue(
          outcome,
          `allowance(${call.owner}, ${call.spender})`,
          allowanceIn(pre, call.owner, call.spender)
        ),
      () => expectUnchanged(pre, post)
    ),
}

export const balanceBoundedBySupply: Property<BalanceOfCall> = {
  id: 'ERC20-STDPROP-04',
  name: 'balance-bounded-by-supply',
  description: 'No balance ever exceeds totalSupply()',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () => fc.record({ setup: history(), call: anyAddress().map(balanceOf) }),
  check: ({ post }) => {
    for (const [account, balance] of post.balances) {
      if (balance.gt(post.totalSupply)) {
        return violation(
          `balance of ${account} is ${shortAmount(balance)}, above totalSupply ${shortAmount(
            post.totalSupply
          )}`
        )
      }
    }
    return undefined
  },
}

export const nullBalanceIsZero: Property<BalanceOfCall> = {
  id: 'ERC20-STDPROP-05',
  name: 'null-balance-is-zero',
  description: 'The null address never holds a balance, whatever was sent its way',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () => fc.record({ setup: history(8), call: fc.constant(balanceOf(ZERO_ADDRESS)) }),
  check: ({ outcome, post }) =>
    firstOf(
      () => expectReadValue(outcome, 'balanceOf(null)', balanceIn(post, ZERO_ADDRESS)),
      () => {
        const held = balanceIn(post, ZERO_ADDRESS)
        if (held.isZero()) return undefined
        return violation(`the null address holds ${shortAmount(held)}`)
      }
    ),
}

export const supplyEqualsSumOfBalances: Property<TotalSupplyCall> = {
  id: 'ERC20-STDPROP-06',
  name: 'supply-equals-sum-of-balances',
  description: 'totalSupply() equals the sum of all balances',
  mode: CallMode.RAW,
  tolerateSetupFailures: true,
  scenario: () => fc.record({ setup: history(8), call: fc.constant(totalSupply()) }),
  check: ({ outcome, post }) => {
    const sum = sumOfBalances(post)
    if (outcome.status === 'completed' && outcome.value && !outcome.value.eq(sum)) {
      return violation(
        `totalSupply() is ${shortAmount(outcome.value)}, balances sum to ${shortAmount(sum)}`
      )
    }
    if (!post.totalSupply.eq(sum)) {
      return violation(
        `totalSupply is ${shortAmount(post.totalSupply)}, balances sum to ${shortAmount(sum)}`
      )
    }
    return undefined
  },
}

export const READ_PROPERTIES = [
  totalSupplyIsPure,
  balanceOfIsPure,
  allowanceIsPure,
  balanceBoundedBySupply,
  nullBalanceIsZero,
  supplyEqualsSumOfBalances,
]
