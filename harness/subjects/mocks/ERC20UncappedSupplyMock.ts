import { BigNumber } from 'ethers'
import { ZERO_ADDRESS } from '../../../common/constants'
import { checkedAdd, overflowingAdd } from '../../../common/numbers'
import { Panic, Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

// Minting wraps the total supply, so balances can sum past MAX_UINT256.
// Transfers keep their checked arithmetic.
export class ERC20UncappedSupplyMock extends ERC20Model {
  constructor() {
    super('ERC20UncappedSupplyMock')
  }

  protected _mint(to: string, amount: BigNumber): void {
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: mint to the zero address')

    const [supply] = overflowingAdd(this.state.totalSupply(), amount)
    this.state.setTotalSupply(supply)

    const credited = checkedAdd(this.state.balanceOf(to), amount)
    if (!credited) throw new Panic()
    this.state.setBalance(to, credited)
  }
}
