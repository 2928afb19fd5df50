import fc from 'fast-check'
import { BigNumber, utils } from 'ethers'
import { ACCOUNTS, MAX_UINT256, ZERO_ADDRESS } from '../common/constants'
import { SetupCall } from './interface'

const MAX = MAX_UINT256.toBigInt()

// Amounts

// Full uint256 range, biased toward the boundaries. Shrinks toward 0.
export const amount = () =>
  fc
    .oneof(
      { arbitrary: fc.bigUintN(256), weight: 3 },
      { arbitrary: fc.bigUintN(64), weight: 3 },
      { arbitrary: fc.constantFrom(0n, 1n, MAX - 1n, MAX), weight: 1 }
    )
    .map((amt) => BigNumber.from(amt))

// [high, low] with high >= low
export const orderedAmounts = () =>
  fc
    .tuple(amount(), amount())
    .map(([a, b]): [BigNumber, BigNumber] => (a.gte(b) ? [a, b] : [b, a]))

// [high, low] with high > low
export const strictlyOrderedAmounts = () =>
  orderedAmounts().filter(([high, low]) => high.gt(low))

// Three amounts a >= b >= c
export const descendingAmounts = () =>
  fc.tuple(amount(), amount(), amount()).map((amts): [BigNumber, BigNumber, BigNumber] => {
    const [a, b, c] = [...amts].sort((x, y) => (x.lt(y) ? 1 : x.gt(y) ? -1 : 0))
    return [a, b, c]
  })

// Addresses

// One of the canonical accounts; shrinks toward ALICE
export const account = () =>
  fc.integer({ min: 0, max: ACCOUNTS.length - 1 }).map((i) => ACCOUNTS[i])

export const randomAddress = () =>
  fc
    .uint8Array({ minLength: 20, maxLength: 20 })
    .map((bytes) => utils.getAddress(utils.hexlify(bytes)))

// Non-null addresses, mostly canonical so that aliasing is common. The filter also binds shrinking.
export const nonNullAddress = () =>
  fc.oneof(
    { arbitrary: account(), weight: 4 },
    { arbitrary: randomAddress().filter((addr) => addr !== ZERO_ADDRESS), weight: 1 }
  )

// Anything, the null address included
export const anyAddress = () =>
  fc.oneof(
    { arbitrary: account(), weight: 4 },
    { arbitrary: fc.constant(ZERO_ADDRESS), weight: 1 },
    { arbitrary: randomAddress(), weight: 1 }
  )

// Histories: arbitrary sequences of standard calls, for invariants over reachable states

export const historyStep = (): fc.Arbitrary<SetupCall> =>
  fc.oneof(
    fc.record({ op: fc.constant('mint' as const), to: account(), amount: amount() }),
    fc.record({
      op: fc.constant('transfer' as const),
      sender: account(),
      to: anyAddress(),
      amount: amount(),
    }),
    fc.record({
      op: fc.constant('approve' as const),
      sender: account(),
      spender: anyAddress(),
      amount: amount(),
    }),
    fc.record({
      op: fc.constant('transferFrom' as const),
      sender: account(),
      from: anyAddress(),
      to: anyAddress(),
      amount: amount(),
    })
  )

export const history = (maxLength = 6) => fc.array(historyStep(), { maxLength })
