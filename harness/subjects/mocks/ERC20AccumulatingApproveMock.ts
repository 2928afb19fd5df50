import { BigNumber } from 'ethers'
import { checkedAdd } from '../../../common/numbers'
import { Panic } from '../../errors'
import { ERC20Model, ReturnValue } from '../ERC20Model'

// approve adds to the current allowance instead of replacing it
export class ERC20AccumulatingApproveMock extends ERC20Model {
  constructor() {
    super('ERC20AccumulatingApproveMock')
  }

  protected doApprove(sender: string, spender: string, amount: BigNumber): ReturnValue {
    const total = checkedAdd(this.state.allowanceOf(sender, spender), amount)
    if (!total) throw new Panic()
    this._approve(sender, spender, total)
    return true
  }
}
