import { BigNumber } from 'ethers'
import { checkedAdd } from '../../../common/numbers'
import { ERC20Model } from '../ERC20Model'

// balanceOf settles one unit of pending interest into any non-empty account it reads
export class ERC20AccruingReadMock extends ERC20Model {
  constructor() {
    super('ERC20AccruingReadMock')
  }

  protected _balanceOf(account: string): BigNumber {
    const balance = this.state.balanceOf(account)
    if (balance.isZero()) return balance

    const supply = checkedAdd(this.state.totalSupply(), BigNumber.from(1))
    if (!supply) return balance
    this.state.setTotalSupply(supply)
    this.state.setBalance(account, balance.add(1))
    return balance
  }
}
