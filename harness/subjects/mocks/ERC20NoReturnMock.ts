import { BigNumber } from 'ethers'
import { ERC20Model, ReturnValue } from '../ERC20Model'

// Mutating calls succeed but return no data, like USDT on mainnet
export class ERC20NoReturnMock extends ERC20Model {
  constructor() {
    super('ERC20NoReturnMock')
  }

  protected doTransfer(sender: string, to: string, amount: BigNumber): ReturnValue {
    super.doTransfer(sender, to, amount)
    return undefined
  }

  protected doTransferFrom(
    sender: string,
    from: string,
    to: string,
    amount: BigNumber
  ): ReturnValue {
    super.doTransferFrom(sender, from, to, amount)
    return undefined
  }

  protected doApprove(sender: string, spender: string, amount: BigNumber): ReturnValue {
    super.doApprove(sender, spender, amount)
    return undefined
  }
}
