import { BigNumber } from 'ethers'
import { ZERO_ADDRESS } from '../../../common/constants'
import { checkedAdd, checkedSub } from '../../../common/numbers'
import { Panic, Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

// Reads both balances before writing either, so a self-transfer credits without debiting
export class ERC20SelfTransferMock extends ERC20Model {
  constructor() {
    super('ERC20SelfTransferMock')
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (from === ZERO_ADDRESS) throw new Revert('ERC20: transfer from the zero address')
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: transfer to the zero address')

    const fromBalance = this.state.balanceOf(from)
    const toBalance = this.state.balanceOf(to)

    const remaining = checkedSub(fromBalance, amount)
    if (!remaining) throw new Revert('ERC20: transfer amount exceeds balance')
    const credited = checkedAdd(toBalance, amount)
    if (!credited) throw new Panic()

    this.state.setBalance(from, remaining)
    this.state.setBalance(to, credited)
  }
}
