import { BigNumber } from 'ethers'
import { ERC20Model, ReturnValue } from '../ERC20Model'

// transferFrom neither checks nor spends the allowance
export class ERC20AllowanceIgnoredMock extends ERC20Model {
  constructor() {
    super('ERC20AllowanceIgnoredMock')
  }

  protected doTransferFrom(
    sender: string,
    from: string,
    to: string,
    amount: BigNumber
  ): ReturnValue {
    this._transfer(from, to, amount)
    return true
  }
}
