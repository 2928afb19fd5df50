import { BigNumber } from 'ethers'
import { MAX_UINT256 } from '../../../common/constants'
import { ERC20Model, ReturnValue } from '../ERC20Model'

// Reports insufficient balance or allowance by returning false instead of reverting
export class ERC20FalseReturnMock extends ERC20Model {
  constructor() {
    super('ERC20FalseReturnMock')
  }

  protected doTransfer(sender: string, to: string, amount: BigNumber): ReturnValue {
    if (this.state.balanceOf(sender).lt(amount)) return false
    return super.doTransfer(sender, to, amount)
  }

  protected doTransferFrom(
    sender: string,
    from: string,
    to: string,
    amount: BigNumber
  ): ReturnValue {
    const allowance = this.state.allowanceOf(from, sender)
    if (!allowance.eq(MAX_UINT256) && allowance.lt(amount)) return false
    if (this.state.balanceOf(from).lt(amount)) return false
    return super.doTransferFrom(sender, from, to, amount)
  }
}
