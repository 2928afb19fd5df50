import { BigNumber } from 'ethers'
import { ZERO_ADDRESS } from '../../../common/constants'
import { checkedAdd, checkedSub } from '../../../common/numbers'
import { Panic, Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

export const FEE_BPS = 100

// Burns 1% of every transferred amount
export class ERC20FeeOnTransferMock extends ERC20Model {
  constructor() {
    super('ERC20FeeOnTransferMock')
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (from === ZERO_ADDRESS) throw new Revert('ERC20: transfer from the zero address')
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: transfer to the zero address')

    const remaining = checkedSub(this.state.balanceOf(from), amount)
    if (!remaining) throw new Revert('ERC20: transfer amount exceeds balance')
    this.state.setBalance(from, remaining)

    const fee = amount.mul(FEE_BPS).div(10000)
    const credited = checkedAdd(this.state.balanceOf(to), amount.sub(fee))
    if (!credited) throw new Panic()
    this.state.setBalance(to, credited)
    this.state.setTotalSupply(this.state.totalSupply().sub(fee))
  }
}
