import fc from 'fast-check'
import { BigNumber } from 'ethers'
import { CallMode, MAX_UINT256, ZERO_ADDRESS } from '../../common/constants'
import { shortAmount } from '../../common/numbers'
import {
  account,
  amount,
  anyAddress,
  descendingAmounts,
  nonNullAddress,
  orderedAmounts,
  strictlyOrderedAmounts,
} from '../arbitraries'
import { TransferFromCall } from '../interface'
import {
  allowanceIn,
  balanceIn,
  completedFalse,
  expectAmount,
  expectCompletedTrue,
  expectReverted,
  expectTrueIfCompleted,
  expectUnchanged,
  firstOf,
  violation,
} from './checks'
import { approve, mint, transferFrom } from './scenarios'
import { Property } from './types'

// `from` holds `balance`, has approved `sender` for exactly `amount <= balance`
const approvedTransferFrom = () =>
  fc
    .tuple(account(), account(), nonNullAddress(), orderedAmounts())
    .map(([sender, from, to, [balance, amt]]) => ({
      setup: [mint(from, balance), approve(from, sender, amt)],
      call: transferFrom(sender, from, to, amt),
    }))

// as above, with a balance already sitting at `to`
const approvedTransferFromWithReceiverBalance = () =>
  fc
    .tuple(account(), account(), nonNullAddress(), orderedAmounts(), amount())
    .map(([sender, from, to, [balance, amt], toBalance]) => ({
      setup: [mint(to, toBalance), mint(from, balance), approve(from, sender, amt)],
      call: transferFrom(sender, from, to, amt),
    }))

// amount 0, with or without a prior approval
const zeroTransferFrom = () =>
  fc
    .tuple(account(), account(), nonNullAddress(), amount(), fc.option(amount()))
    .map(([sender, from, to, balance, allowed]) => ({
      setup:
        allowed === null
          ? [mint(from, balance)]
          : [mint(from, balance), approve(from, sender, allowed)],
      call: transferFrom(sender, from, to, BigNumber.from(0)),
    }))

const notSelf = ({ call }: { call: TransferFromCall }): boolean => call.from !== call.to

export const transferFromNullSourceReverts: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-19',
  name: 'transfer-from-null-source-reverts',
  description: 'transferFrom() out of the null address reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc.tuple(account(), nonNullAddress(), amount()).map(([sender, to, amt]) => ({
      setup: [],
      call: transferFrom(sender, ZERO_ADDRESS, to, amt),
    })),
  check: ({ outcome }) => expectReverted(outcome, 'transferFrom out of the null address'),
}

export const transferFromToNullReverts: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-20',
  name: 'transfer-from-to-null-reverts',
  description: 'transferFrom() into the null address reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), orderedAmounts())
      .map(([sender, from, [balance, amt]]) => ({
        setup: [mint(from, balance), approve(from, sender, amt)],
        call: transferFrom(sender, from, ZERO_ADDRESS, amt),
      })),
  check: ({ outcome }) => expectReverted(outcome, 'transferFrom into the null address'),
}

export const transferFromExceedingBalanceReverts: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-21',
  name: 'transfer-from-exceeding-balance-reverts',
  description: 'transferFrom() of more than the source holds reverts, allowance notwithstanding',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), nonNullAddress(), strictlyOrderedAmounts())
      .map(([sender, from, to, [amt, balance]]) => ({
        setup: [mint(from, balance), approve(from, sender, amt)],
        call: transferFrom(sender, from, to, amt),
      })),
  precondition: ({ call }, pre) => call.amount.gt(balanceIn(pre, call.from)),
  check: ({ outcome }) => expectReverted(outcome, 'transferFrom exceeding the balance'),
}

export const transferFromExceedingAllowanceReverts: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-22',
  name: 'transfer-from-exceeding-allowance-reverts',
  description: 'transferFrom() of more than the allowance reverts and leaves the allowance as is',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), nonNullAddress(), descendingAmounts())
      .map(([sender, from, to, [balance, amt, allowed]]) => ({
        setup: [mint(from, balance), approve(from, sender, allowed)],
        call: transferFrom(sender, from, to, amt),
      })),
  precondition: ({ call }, pre) => call.amount.gt(allowanceIn(pre, call.from, call.sender)),
  check: ({ scenario: { call }, outcome, pre, post }) =>
    firstOf(
      () => expectReverted(outcome, 'transferFrom exceeding the allowance'),
      () =>
        expectAmount(
          `allowance of ${call.sender} over ${call.from}`,
          allowanceIn(post, call.from, call.sender),
          allowanceIn(pre, call.from, call.sender)
        )
    ),
}

export const transferFromReturnsTrue: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-23',
  name: 'transfer-from-returns-true',
  description: 'transferFrom() either reverts or returns true',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), anyAddress(), amount(), amount(), amount())
      .map(([sender, from, to, balance, allowed, amt]) => ({
        setup: [mint(from, balance), approve(from, sender, allowed)],
        call: transferFrom(sender, from, to, amt),
      })),
  check: ({ outcome }) => expectTrueIfCompleted(outcome, 'transferFrom'),
}

export const transferFromZeroAmountSucceeds: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-24',
  name: 'transfer-from-zero-amount-succeeds',
  description: 'transferFrom() of 0 between non-null accounts completes and returns true',
  mode: CallMode.RAW,
  scenario: zeroTransferFrom,
  check: ({ outcome }) => expectCompletedTrue(outcome, 'zero-amount transferFrom'),
}

export const transferFromZeroAmountChangesNothing: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-25',
  name: 'transfer-from-zero-amount-changes-nothing',
  description: 'transferFrom() of 0 changes no balance, allowance or supply',
  mode: CallMode.TYPED,
  scenario: zeroTransferFrom,
  check: ({ pre, post }) => expectUnchanged(pre, post),
}

export const transferFromToSelfKeepsBalance: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-26',
  name: 'transfer-from-to-self-keeps-balance',
  description: 'transferFrom() with from == to returns true and leaves the balance as is',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(account(), account(), orderedAmounts())
      .map(([sender, from, [balance, amt]]) => ({
        setup: [mint(from, balance), approve(from, sender, amt)],
        call: transferFrom(sender, from, from, amt),
      })),
  check: ({ scenario: { call }, outcome, pre, post }) =>
    firstOf(
      () =>
        outcome.status === 'completed' && outcome.result === false
          ? completedFalse('self-transferFrom returned false')
          : undefined,
      () =>
        expectAmount(
          `balance of ${call.from}`,
          balanceIn(post, call.from),
          balanceIn(pre, call.from)
        )
    ),
}

export const transferFromDebitsSource: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-27',
  name: 'transfer-from-debits-source',
  description: 'transferFrom() to another account lowers the source by exactly the amount',
  mode: CallMode.TYPED,
  scenario: approvedTransferFrom,
  precondition: notSelf,
  check: ({ scenario: { call }, pre, post }) =>
    expectAmount(
      `balance of source ${call.from}`,
      balanceIn(post, call.from),
      balanceIn(pre, call.from).sub(call.amount)
    ),
}

export const transferFromCreditsDestination: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-28',
  name: 'transfer-from-credits-destination',
  description: 'transferFrom() to another account raises the destination by exactly the amount',
  mode: CallMode.TYPED,
  scenario: approvedTransferFromWithReceiverBalance,
  precondition: notSelf,
  check: ({ scenario: { call }, pre, post }) =>
    expectAmount(
      `balance of destination ${call.to}`,
      balanceIn(post, call.to),
      balanceIn(pre, call.to).add(call.amount)
    ),
}

export const transferFromConsumesAllowance: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-29',
  name: 'transfer-from-consumes-allowance',
  description: 'transferFrom() lowers a finite allowance by exactly the amount',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(account(), account(), nonNullAddress(), orderedAmounts())
      .map(([sender, from, to, [allowed, amt]]) => ({
        setup: [mint(from, amt), approve(from, sender, allowed)],
        call: transferFrom(sender, from, to, amt),
      })),
  // MAX_UINT256 is the unlimited sentinel, covered by STDPROP-30
  precondition: ({ call }, pre) => allowanceIn(pre, call.from, call.sender).lt(MAX_UINT256),
  check: ({ scenario: { call }, pre, post }) =>
    expectAmount(
      `allowance of ${call.sender} over ${call.from}`,
      allowanceIn(post, call.from, call.sender),
      allowanceIn(pre, call.from, call.sender).sub(call.amount)
    ),
}

export const transferFromUnlimitedAllowance: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-30',
  name: 'transfer-from-unlimited-allowance',
  description:
    'transferFrom() under a MAX_UINT256 allowance leaves it unlimited or lowers it by the amount',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(account(), account(), nonNullAddress(), orderedAmounts())
      .map(([sender, from, to, [balance, amt]]) => ({
        setup: [mint(from, balance), approve(from, sender, MAX_UINT256)],
        call: transferFrom(sender, from, to, amt),
      })),
  check: ({ scenario: { call }, post }) => {
    const after = allowanceIn(post, call.from, call.sender)
    if (after.eq(MAX_UINT256) || after.eq(MAX_UINT256.sub(call.amount))) return undefined
    return violation(
      `unlimited allowance of ${call.sender} over ${call.from} became ${shortAmount(after)}`
    )
  },
}

export const transferFromChangesOnlyParties: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-31',
  name: 'transfer-from-changes-only-parties',
  description:
    'transferFrom() changes only the two balances and the allowance it spends; supply stays',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(
        approvedTransferFrom(),
        account(),
        amount(),
        account(),
        amount()
      )
      // another approval of the spender under test would replace the allowance being spent
      .filter(([{ call }, , , otherSpender]) => otherSpender !== call.sender)
      .map(([{ setup, call }, other, otherBalance, otherSpender, allowed]) => ({
        setup: [
          ...setup,
          mint(other, otherBalance),
          approve(other, otherSpender, allowed),
          approve(call.from, otherSpender, allowed),
        ],
        call,
      })),
  precondition: notSelf,
  check: ({ scenario: { call }, pre, post }) =>
    expectUnchanged(pre, post, {
      balances: [call.from, call.to],
      allowances: [[call.from, call.sender]],
    }),
}

export const transferFromOverflowReverts: Property<TransferFromCall> = {
  id: 'ERC20-STDPROP-32',
  name: 'transfer-from-overflow-reverts',
  description: 'transferFrom() that would lift the destination past MAX_UINT256 reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), account(), fc.bigUintN(64), fc.bigUintN(64), fc.bigUintN(64))
      .map(([sender, from, to, headroom, excess, slack]) => {
        const amt = BigNumber.from(headroom).add(excess).add(1)
        return {
          setup: [
            mint(to, MAX_UINT256.sub(headroom)),
            mint(from, amt.add(slack)),
            approve(from, sender, amt),
          ],
          call: transferFrom(sender, from, to, amt),
        }
      }),
  precondition: ({ call }, pre) =>
    call.from !== call.to &&
    balanceIn(pre, call.from).gte(call.amount) &&
    balanceIn(pre, call.to).add(call.amount).gt(MAX_UINT256),
  check: ({ scenario: { call }, outcome, pre, post }) =>
    firstOf(
      () => expectReverted(outcome, 'overflowing transferFrom'),
      () =>
        expectAmount(
          `balance of source ${call.from}`,
          balanceIn(post, call.from),
          balanceIn(pre, call.from)
        ),
      () =>
        expectAmount(
          `balance of destination ${call.to}`,
          balanceIn(post, call.to),
          balanceIn(pre, call.to)
        )
    ),
}

export const TRANSFER_FROM_PROPERTIES = [
  transferFromNullSourceReverts,
  transferFromToNullReverts,
  transferFromExceedingBalanceReverts,
  transferFromExceedingAllowanceReverts,
  transferFromReturnsTrue,
  transferFromZeroAmountSucceeds,
  transferFromZeroAmountChangesNothing,
  transferFromToSelfKeepsBalance,
  transferFromDebitsSource,
  transferFromCreditsDestination,
  transferFromConsumesAllowance,
  transferFromUnlimitedAllowance,
  transferFromChangesOnlyParties,
  transferFromOverflowReverts,
]
