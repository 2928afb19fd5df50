import { BigNumber } from 'ethers'
import { expect } from 'chai'
import { TokenCaller } from '../../../harness/adapter/TokenCaller'
import { transferFrom } from '../../../harness/properties/scenarios'
import { expectAmount } from '../../utils/matchers'
import { TokenCommand, TokenModel } from './TokenModel'

export class TransferFromCommand implements TokenCommand {
  constructor(
    readonly spender: string,
    readonly from: string,
    readonly to: string,
    readonly amount: BigNumber
  ) {}
  async check() {
    return true
  }
  async run(m: TokenModel, p: TokenCaller) {
    const succeeds = m.transferFrom(this.spender, this.from, this.to, this.amount)
    const outcome = await p.typed(transferFrom(this.spender, this.from, this.to, this.amount))
    expect(outcome.status, this.toString()).to.equal(succeeds ? 'completed' : 'reverted')

    expectAmount(await p.subject.balanceOf(this.from), m.balanceOf(this.from))
    expectAmount(await p.subject.balanceOf(this.to), m.balanceOf(this.to))
    expectAmount(
      await p.subject.allowance(this.from, this.spender),
      m.allowanceOf(this.from, this.spender)
    )
  }
  toString() {
    return `TRANSFERFROM(${this.spender}, ${this.from}, ${this.to}, "${this.amount}")`
  }
}
