import fc from 'fast-check'
import { BigNumber } from 'ethers'
import { CallMode, MAX_UINT256, ZERO_ADDRESS } from '../../common/constants'
import {
  account,
  amount,
  anyAddress,
  nonNullAddress,
  orderedAmounts,
  strictlyOrderedAmounts,
} from '../arbitraries'
import { TransferCall } from '../interface'
import {
  balanceIn,
  completedFalse,
  expectAmount,
  expectCompletedTrue,
  expectReverted,
  expectTrueIfCompleted,
  expectUnchanged,
  firstOf,
} from './checks'
import { mint, approve, transfer } from './scenarios'
import { Property } from './types'

// sender holds `balance` and sends `amount <= balance` to `to`
const fundedTransfer = () =>
  fc
    .tuple(account(), nonNullAddress(), orderedAmounts())
    .map(([sender, to, [balance, amt]]) => ({
      setup: [mint(sender, balance)],
      call: transfer(sender, to, amt),
    }))

// sender and `to` both hold balances before the transfer
const fundedTransferWithReceiverBalance = () =>
  fc
    .tuple(account(), nonNullAddress(), orderedAmounts(), amount())
    .map(([sender, to, [balance, amt], toBalance]) => ({
      setup: [mint(to, toBalance), mint(sender, balance)],
      call: transfer(sender, to, amt),
    }))

// sender transfers 0, whatever it holds
const zeroTransfer = () =>
  fc.tuple(account(), nonNullAddress(), amount()).map(([sender, to, balance]) => ({
    setup: [mint(sender, balance)],
    call: transfer(sender, to, BigNumber.from(0)),
  }))

const notSelf = ({ call }: { call: TransferCall }): boolean => call.sender !== call.to

export const transferToNullReverts: Property<TransferCall> = {
  id: 'ERC20-STDPROP-07',
  name: 'transfer-to-null-reverts',
  description: 'transfer() to the null address reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc.tuple(account(), orderedAmounts()).map(([sender, [balance, amt]]) => ({
      setup: [mint(sender, balance)],
      call: transfer(sender, ZERO_ADDRESS, amt),
    })),
  check: ({ outcome }) => expectReverted(outcome, 'transfer to the null address'),
}

export const transferFromNullSenderReverts: Property<TransferCall> = {
  id: 'ERC20-STDPROP-08',
  name: 'transfer-from-null-reverts',
  description: 'transfer() called by the null address reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc.tuple(nonNullAddress(), amount()).map(([to, amt]) => ({
      setup: [],
      call: transfer(ZERO_ADDRESS, to, amt),
    })),
  check: ({ outcome }) => expectReverted(outcome, 'transfer by the null address'),
}

export const transferExceedingBalanceReverts: Property<TransferCall> = {
  id: 'ERC20-STDPROP-09',
  name: 'transfer-exceeding-balance-reverts',
  description: 'transfer() of more than the sender holds reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), nonNullAddress(), strictlyOrderedAmounts())
      .map(([sender, to, [amt, balance]]) => ({
        setup: [mint(sender, balance)],
        call: transfer(sender, to, amt),
      })),
  precondition: ({ call }, pre) => call.amount.gt(balanceIn(pre, call.sender)),
  check: ({ outcome }) => expectReverted(outcome, 'transfer exceeding the balance'),
}

export const transferReturnsTrue: Property<TransferCall> = {
  id: 'ERC20-STDPROP-10',
  name: 'transfer-returns-true',
  description: 'transfer() either reverts or returns true',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), anyAddress(), amount(), amount())
      .map(([sender, to, balance, amt]) => ({
        setup: [mint(sender, balance)],
        call: transfer(sender, to, amt),
      })),
  check: ({ outcome }) => expectTrueIfCompleted(outcome, 'transfer'),
}

export const transferZeroAmountSucceeds: Property<TransferCall> = {
  id: 'ERC20-STDPROP-11',
  name: 'transfer-zero-amount-succeeds',
  description: 'transfer() of 0 between non-null accounts completes and returns true',
  mode: CallMode.RAW,
  scenario: zeroTransfer,
  check: ({ outcome }) => expectCompletedTrue(outcome, 'zero-amount transfer'),
}

export const transferZeroAmountChangesNothing: Property<TransferCall> = {
  id: 'ERC20-STDPROP-12',
  name: 'transfer-zero-amount-changes-nothing',
  description: 'transfer() of 0 changes no balance, allowance or supply',
  mode: CallMode.TYPED,
  scenario: zeroTransfer,
  check: ({ pre, post }) => expectUnchanged(pre, post),
}

export const transferToSelfKeepsBalance: Property<TransferCall> = {
  id: 'ERC20-STDPROP-13',
  name: 'transfer-to-self-keeps-balance',
  description: 'A self-transfer within the balance returns true and leaves the balance as is',
  mode: CallMode.TYPED,
  scenario: () =>
    fc.tuple(account(), orderedAmounts()).map(([sender, [balance, amt]]) => ({
      setup: [mint(sender, balance)],
      call: transfer(sender, sender, amt),
    })),
  check: ({ scenario: { call }, outcome, pre, post }) =>
    firstOf(
      () =>
        outcome.status === 'completed' && outcome.result === false
          ? completedFalse('self-transfer returned false')
          : undefined,
      () =>
        expectAmount(
          `balance of ${call.sender}`,
          balanceIn(post, call.sender),
          balanceIn(pre, call.sender)
        )
    ),
}

export const transferDebitsSender: Property<TransferCall> = {
  id: 'ERC20-STDPROP-14',
  name: 'transfer-debits-sender',
  description: 'transfer() to another account lowers the sender balance by exactly the amount',
  mode: CallMode.TYPED,
  scenario: fundedTransfer,
  precondition: notSelf,
  check: ({ scenario: { call }, pre, post }) =>
    expectAmount(
      `balance of sender ${call.sender}`,
      balanceIn(post, call.sender),
      balanceIn(pre, call.sender).sub(call.amount)
    ),
}

export const transferCreditsReceiver: Property<TransferCall> = {
  id: 'ERC20-STDPROP-15',
  name: 'transfer-credits-receiver',
  description: 'transfer() to another account raises the receiver balance by exactly the amount',
  mode: CallMode.TYPED,
  scenario: fundedTransferWithReceiverBalance,
  precondition: notSelf,
  check: ({ scenario: { call }, pre, post }) =>
    expectAmount(
      `balance of receiver ${call.to}`,
      balanceIn(post, call.to),
      balanceIn(pre, call.to).add(call.amount)
    ),
}

export const transferIsolatesOtherAccounts: Property<TransferCall> = {
  id: 'ERC20-STDPROP-16',
  name: 'transfer-isolates-other-accounts',
  description: 'transfer() changes no balance but the two parties, and no allowance',
  mode: CallMode.TYPED,
  scenario: () =>
    fc
      .tuple(account(), nonNullAddress(), orderedAmounts(), account(), amount(), account(), amount())
      .map(([sender, to, [balance, amt], other, otherBalance, spender, allowed]) => ({
        setup: [mint(sender, balance), mint(other, otherBalance), approve(sender, spender, allowed)],
        call: transfer(sender, to, amt),
      })),
  check: ({ scenario: { call }, pre, post }) =>
    expectUnchanged(pre, post, { balances: [call.sender, call.to], totalSupply: true }),
}

export const transferPreservesSupply: Property<TransferCall> = {
  id: 'ERC20-STDPROP-17',
  name: 'transfer-preserves-supply',
  description: 'transfer() never changes totalSupply()',
  mode: CallMode.TYPED,
  scenario: fundedTransferWithReceiverBalance,
  check: ({ pre, post }) => expectAmount('totalSupply', post.totalSupply, pre.totalSupply),
}

export const transferOverflowReverts: Property<TransferCall> = {
  id: 'ERC20-STDPROP-18',
  name: 'transfer-overflow-reverts',
  description: 'transfer() that would lift the receiver past MAX_UINT256 reverts',
  mode: CallMode.RAW,
  scenario: () =>
    fc
      .tuple(account(), account(), fc.bigUintN(64), fc.bigUintN(64), fc.bigUintN(64))
      .map(([sender, to, headroom, excess, slack]) => {
        // the receiver has `headroom` left; the amount exceeds it by 1 + excess
        const amt = BigNumber.from(headroom).add(excess).add(1)
        return {
          setup: [mint(to, MAX_UINT256.sub(headroom)), mint(sender, amt.add(slack))],
          call: transfer(sender, to, amt),
        }
      }),
  precondition: ({ call }, pre) =>
    call.sender !== call.to &&
    balanceIn(pre, call.sender).gte(call.amount) &&
    balanceIn(pre, call.to).add(call.amount).gt(MAX_UINT256),
  check: ({ scenario: { call }, outcome, pre, post }) =>
    firstOf(
      () => expectReverted(outcome, 'overflowing transfer'),
      () =>
        expectAmount(
          `balance of sender ${call.sender}`,
          balanceIn(post, call.sender),
          balanceIn(pre, call.sender)
        ),
      () =>
        expectAmount(
          `balance of receiver ${call.to}`,
          balanceIn(post, call.to),
          balanceIn(pre, call.to)
        )
    ),
}

export const TRANSFER_PROPERTIES = [
  transferToNullReverts,
  transferFromNullSenderReverts,
  transferExceedingBalanceReverts,
  transferReturnsTrue,
  transferZeroAmountSucceeds,
  transferZeroAmountChangesNothing,
  transferToSelfKeepsBalance,
  transferDebitsSender,
  transferCreditsReceiver,
  transferIsolatesOtherAccounts,
  transferPreservesSupply,
  transferOverflowReverts,
]
