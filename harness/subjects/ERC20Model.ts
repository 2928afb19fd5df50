import { BigNumber, utils } from 'ethers'
import { MAX_UINT256, ZERO_ADDRESS } from '../../common/constants'
import { checkedAdd, checkedSub } from '../../common/numbers'
import { ERC20_INTERFACE } from '../abi'
import { Panic, Revert } from '../errors'
import { ERC20Subject } from '../interface'
import { AccountState } from '../state/AccountState'

// What a mutating call hands back. `undefined` means the call returns no data at all.
export type ReturnValue = boolean | undefined

/*
 * Reference token: OpenZeppelin ERC20 semantics over an in-process AccountState.
 *
 * Every public entry point runs inside `state.atomically`, so a revert leaves no trace.
 * Mocks override the protected hooks to introduce a single defect each.
 */
export class ERC20Model implements ERC20Subject {
  readonly state = new AccountState()

  constructor(readonly name: string = 'ERC20Model') {}

  async mint(to: string, amount: BigNumber): Promise<void> {
    this.state.atomically(() => this._mint(utils.getAddress(to), amount))
  }

  async totalSupply(): Promise<BigNumber> {
    return this.state.atomically(() => this._totalSupply())
  }

  async balanceOf(account: string): Promise<BigNumber> {
    return this.state.atomically(() => this._balanceOf(utils.getAddress(account)))
  }

  async allowance(owner: string, spender: string): Promise<BigNumber> {
    return this.state.atomically(() =>
      this._allowance(utils.getAddress(owner), utils.getAddress(spender))
    )
  }

  async transfer(sender: string, to: string, amount: BigNumber): Promise<boolean> {
    return typed(this.runTransfer(sender, to, amount))
  }

  async transferFrom(
    sender: string,
    from: string,
    to: string,
    amount: BigNumber
  ): Promise<boolean> {
    return typed(this.runTransferFrom(sender, from, to, amount))
  }

  async approve(sender: string, spender: string, amount: BigNumber): Promise<boolean> {
    return typed(this.runApprove(sender, spender, amount))
  }

  // Low-level entry point: ABI calldata in, ABI return data out
  async call(sender: string, data: string): Promise<string> {
    let tx: utils.TransactionDescription
    try {
      tx = ERC20_INTERFACE.parseTransaction({ data })
    } catch {
      throw new Revert(`unrecognized calldata ${data.slice(0, 10)}`)
    }
    const args = tx.args

    switch (tx.name) {
      case 'totalSupply':
        return encodeAmount(tx.name, await this.totalSupply())
      case 'balanceOf':
        return encodeAmount(tx.name, await this.balanceOf(argAddress(args, 0)))
      case 'allowance':
        return encodeAmount(
          tx.name,
          await this.allowance(argAddress(args, 0), argAddress(args, 1))
        )
      case 'transfer':
        return encodeBool(tx.name, this.runTransfer(sender, argAddress(args, 0), argAmount(args, 1)))
      case 'transferFrom':
        return encodeBool(
          tx.name,
          this.runTransferFrom(sender, argAddress(args, 0), argAddress(args, 1), argAmount(args, 2))
        )
      case 'approve':
        return encodeBool(tx.name, this.runApprove(sender, argAddress(args, 0), argAmount(args, 1)))
      default:
        throw new Revert(`unknown function ${tx.name}`)
    }
  }

  private runTransfer(sender: string, to: string, amount: BigNumber): ReturnValue {
    return this.state.atomically(() =>
      this.doTransfer(utils.getAddress(sender), utils.getAddress(to), amount)
    )
  }

  private runTransferFrom(sender: string, from: string, to: string, amount: BigNumber): ReturnValue {
    return this.state.atomically(() =>
      this.doTransferFrom(
        utils.getAddress(sender),
        utils.getAddress(from),
        utils.getAddress(to),
        amount
      )
    )
  }

  private runApprove(sender: string, spender: string, amount: BigNumber): ReturnValue {
    return this.state.atomically(() =>
      this.doApprove(utils.getAddress(sender), utils.getAddress(spender), amount)
    )
  }

  // ==== Hooks. Addresses reaching these are checksummed.

  protected _totalSupply(): BigNumber {
    return this.state.totalSupply()
  }

  protected _balanceOf(account: string): BigNumber {
    return this.state.balanceOf(account)
  }

  protected _allowance(owner: string, spender: string): BigNumber {
    return this.state.allowanceOf(owner, spender)
  }

  protected doTransfer(sender: string, to: string, amount: BigNumber): ReturnValue {
    this._transfer(sender, to, amount)
    return true
  }

  protected doTransferFrom(
    sender: string,
    from: string,
    to: string,
    amount: BigNumber
  ): ReturnValue {
    this._spendAllowance(from, sender, amount)
    this._transfer(from, to, amount)
    return true
  }

  protected doApprove(sender: string, spender: string, amount: BigNumber): ReturnValue {
    this._approve(sender, spender, amount)
    return true
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (from === ZERO_ADDRESS) throw new Revert('ERC20: transfer from the zero address')
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: transfer to the zero address')

    const remaining = checkedSub(this.state.balanceOf(from), amount)
    if (!remaining) throw new Revert('ERC20: transfer amount exceeds balance')
    this.state.setBalance(from, remaining)

    // Read after the debit, so a self-transfer nets to zero
    const credited = checkedAdd(this.state.balanceOf(to), amount)
    if (!credited) throw new Panic()
    this.state.setBalance(to, credited)
  }

  protected _mint(to: string, amount: BigNumber): void {
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: mint to the zero address')

    const supply = checkedAdd(this.state.totalSupply(), amount)
    if (!supply) throw new Panic()
    this.state.setTotalSupply(supply)

    const credited = checkedAdd(this.state.balanceOf(to), amount)
    if (!credited) throw new Panic()
    this.state.setBalance(to, credited)
  }

  protected _approve(owner: string, spender: string, amount: BigNumber): void {
    if (owner === ZERO_ADDRESS) throw new Revert('ERC20: approve from the zero address')
    if (spender === ZERO_ADDRESS) throw new Revert('ERC20: approve to the zero address')
    this.state.setAllowance(owner, spender, amount)
  }

  // An allowance of MAX_UINT256 is unlimited and never decreases
  protected _spendAllowance(owner: string, spender: string, amount: BigNumber): void {
    const current = this.state.allowanceOf(owner, spender)
    if (current.eq(MAX_UINT256)) return

    const remaining = checkedSub(current, amount)
    if (!remaining) throw new Revert('ERC20: insufficient allowance')
    this._approve(owner, spender, remaining)
  }
}

// A typed call decodes a bool, so a call that returns nothing fails to decode
function typed(value: ReturnValue): boolean {
  if (value === undefined) throw new Revert('call returned no data')
  return value
}

function encodeBool(fn: string, value: ReturnValue): string {
  if (value === undefined) return '0x'
  return ERC20_INTERFACE.encodeFunctionResult(fn, [value])
}

function encodeAmount(fn: string, value: BigNumber): string {
  return ERC20_INTERFACE.encodeFunctionResult(fn, [value])
}

function argAddress(args: utils.Result, index: number): string {
  const value: unknown = args[index]
  if (typeof value !== 'string') throw new Revert(`malformed address argument ${index}`)
  return value
}

function argAmount(args: utils.Result, index: number): BigNumber {
  const value: unknown = args[index]
  if (!BigNumber.isBigNumber(value)) throw new Revert(`malformed amount argument ${index}`)
  return value
}
