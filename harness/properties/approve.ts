import fc from 'fast-check'
import { CallMode, ZERO_ADDRESS } from '../../common/constants'
import { account, amount, nonNullAddress } from '../arbitraries'
import { ApproveCall } from '../interface'
import {
  allowanceIn,
  expectAmount,
  expectCompletedTrue,
  expectReverted,
  expectUnchanged,
} from './checks'
import { approve, mint } from './scenarios'
import { Property } from './types'

const plainApprove = () =>
  fc.tuple(account(), nonNullAddress(), amount()).map(([sender, spender, amt]) => ({
    setup: [],
    call: approve(sender, spender, amt),
  }))

export const approveNullSpenderReverts: Property<ApproveCall> = {
  id: 'ERC20-STDPROP-33',
  name: 'approve-null-spender-reverts',
  description: 'approve() of the null address as spender reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc.tuple(account(), amount()).map(([sender, amt]) => ({
      setup: [],
      call: approve(sender, ZERO_ADDRESS, amt),
    })),
  check: ({ outcome }) => expectReverted(outcome, 'approve of the null address'),
}

export const approveReturnsTrue: Property<ApproveCall> = {
  id: 'ERC20-STDPROP-34',
  name: 'approve-returns-true',
  description: 'approve() of a non-null spender completes and returns true',
  mode: CallMode.RAW,
  scenario: plainApprove,
  check: ({ outcome }) => expectCompletedTrue(outcome, 'approve'),
}

export const approveSetsAllowance: Property<ApproveCall> = {
  id: 'ERC20-STDPROP-35',
  name: 'approve-sets-allowance',
  description: 'approve(spender, X) leaves allowance(sender, spender) at exactly X',
  mode: CallMode.TYPED,
  scenario: plainApprove,
  check: ({ scenario: { call }, post }) =>
    expectAmount(
      `allowance of ${call.spender} over ${call.sender}`,
      allowanceIn(post, call.sender, call.spender),
      call.amount
    ),
}

export const approveOverwritesAllowance: Property<ApproveCall> = {
  id: 'ERC20-STDPROP-36',
  name: 'approve-overwrites-allowance',
  description: 'A second approve() replaces the first instead of adding to it',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(account(), nonNullAddress(), amount(), amount())
      .map(([sender, spender, first, second]) => ({
        setup: [approve(sender, spender, first)],
        call: approve(sender, spender, second),
      })),
  check: ({ scenario: { call }, post }) =>
    expectAmount(
      `allowance of ${call.spender} over ${call.sender}`,
      allowanceIn(post, call.sender, call.spender),
      call.amount
    ),
}

export const approveIsolatesState: Property<ApproveCall> = {
  id: 'ERC20-STDPROP-37',
  name: 'approve-isolates-state',
  description: 'approve() changes no balance, no supply and no other allowance',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(plainApprove(), account(), amount(), account(), account(), amount())
      .map(([{ call }, holder, held, owner, spender, allowed]) => ({
        setup: [mint(holder, held), approve(owner, spender, allowed)],
        call,
      })),
  check: ({ scenario: { call }, pre, post }) =>
    expectUnchanged(pre, post, { allowances: [[call.sender, call.spender]] }),
}

export const APPROVE_PROPERTIES = [
  approveNullSpenderReverts,
  approveReturnsTrue,
  approveSetsAllowance,
  approveOverwritesAllowance,
  approveIsolatesState,
]
