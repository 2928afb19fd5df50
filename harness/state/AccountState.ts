import { BigNumber, utils } from 'ethers'
import { ZERO, isUint256 } from '../../common/numbers'
import { Panic } from '../errors'
import { allowanceKey } from '../interface'

type Journal = {
  balances: Map<string, BigNumber>
  allowances: Map<string, BigNumber>
  totalSupply: BigNumber
}

/*
 * Storage substrate for in-process token subjects.
 *
 * - Reads are total: unknown accounts and pairs read as zero.
 * - Writes outside [0, MAX_UINT256] throw a Panic, which is a revert.
 * - `atomically` rolls back every write of a call that throws.
 *
 * The null address gets no special treatment here. Rejecting a credit to it is the subject's
 * job, so a subject that forgets is observable rather than silently corrected.
 */
export class AccountState {
  private balances = new Map<string, BigNumber>()
  private allowances = new Map<string, BigNumber>()
  private supply: BigNumber = ZERO

  private journal: Journal | undefined

  balanceOf(account: string): BigNumber {
    return this.balances.get(utils.getAddress(account)) ?? ZERO
  }

  allowanceOf(owner: string, spender: string): BigNumber {
    return this.allowances.get(pairKey(owner, spender)) ?? ZERO
  }

  totalSupply(): BigNumber {
    return this.supply
  }

  setBalance(account: string, value: BigNumber): void {
    this.balances.set(utils.getAddress(account), inRange(value))
  }

  setAllowance(owner: string, spender: string, value: BigNumber): void {
    this.allowances.set(pairKey(owner, spender), inRange(value))
  }

  setTotalSupply(value: BigNumber): void {
    this.supply = inRange(value)
  }

  // Every account that has a balance entry, in insertion order
  accounts(): string[] {
    return [...this.balances.keys()]
  }

  // Runs `fn` as one all-or-nothing transition. Nested calls join the outermost one.
  atomically<T>(fn: () => T): T {
    if (this.journal) return fn()

    const journal: Journal = {
      balances: new Map(this.balances),
      allowances: new Map(this.allowances),
      totalSupply: this.supply,
    }
    this.journal = journal
    try {
      return fn()
    } catch (e) {
      this.balances = journal.balances
      this.allowances = journal.allowances
      this.supply = journal.totalSupply
      throw e
    } finally {
      this.journal = undefined
    }
  }
}

const pairKey = (owner: string, spender: string): string =>
  allowanceKey(utils.getAddress(owner), utils.getAddress(spender))

function inRange(value: BigNumber): BigNumber {
  if (!isUint256(value)) throw new Panic()
  return value
}
