import { BigNumber } from 'ethers'
import { checkedAdd, checkedSub } from '../../../common/numbers'
import { Panic, Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

// Accepts the null address as sender, receiver and spender
export class ERC20NoZeroAddressCheckMock extends ERC20Model {
  constructor() {
    super('ERC20NoZeroAddressCheckMock')
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    const remaining = checkedSub(this.state.balanceOf(from), amount)
    if (!remaining) throw new Revert('ERC20: transfer amount exceeds balance')
    this.state.setBalance(from, remaining)

    const credited = checkedAdd(this.state.balanceOf(to), amount)
    if (!credited) throw new Panic()
    this.state.setBalance(to, credited)
  }

  protected _approve(owner: string, spender: string, amount: BigNumber): void {
    this.state.setAllowance(owner, spender, amount)
  }
}
