import { BigNumber } from 'ethers'
import { ZERO_ADDRESS } from '../../../common/constants'
import { overflowingAdd } from '../../../common/numbers'
import { Revert } from '../../errors'
import { ERC20Model } from '../ERC20Model'

// Credits and mints wrap modulo 2^256 instead of reverting
export class ERC20UncheckedMock extends ERC20Model {
  constructor() {
    super('ERC20UncheckedMock')
  }

  protected _transfer(from: string, to: string, amount: BigNumber): void {
    if (from === ZERO_ADDRESS) throw new Revert('ERC20: transfer from the zero address')
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: transfer to the zero address')

    const fromBalance = this.state.balanceOf(from)
    if (fromBalance.lt(amount)) throw new Revert('ERC20: transfer amount exceeds balance')
    this.state.setBalance(from, fromBalance.sub(amount))

    const [credited] = overflowingAdd(this.state.balanceOf(to), amount)
    this.state.setBalance(to, credited)
  }

  protected _mint(to: string, amount: BigNumber): void {
    if (to === ZERO_ADDRESS) throw new Revert('ERC20: mint to the zero address')

    const [supply] = overflowingAdd(this.state.totalSupply(), amount)
    this.state.setTotalSupply(supply)
    const [credited] = overflowingAdd(this.state.balanceOf(to), amount)
    this.state.setBalance(to, credited)
  }
}
