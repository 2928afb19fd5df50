import { BigNumber } from 'ethers'
import { Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

// Rejects zero-amount transfers
export class ERC20ZeroAmountRevertMock extends ERC20Model {
  constructor() {
    super('ERC20ZeroAmountRevertMock')
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (amount.isZero()) throw new Revert('ERC20: zero amount')
    super._transfer(from, to, amount)
  }
}
