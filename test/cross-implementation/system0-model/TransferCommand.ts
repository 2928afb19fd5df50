import { BigNumber } from 'ethers'
import { expect } from 'chai'
import { TokenCaller } from '../../../harness/adapter/TokenCaller'
import { transfer } from '../../../harness/properties/scenarios'
import { expectAmount } from '../../utils/matchers'
import { TokenCommand, TokenModel } from './TokenModel'

export class TransferCommand implements TokenCommand {
  constructor(readonly from: string, readonly to: string, readonly amount: BigNumber) {}
  async check() {
    return true
  }
  async run(m: TokenModel, p: TokenCaller) {
    expectAmount(await p.subject.balanceOf(this.from), m.balanceOf(this.from))

    // Perform operations on model and subject
    const succeeds = m.transfer(this.from, this.to, this.amount)
    const outcome = await p.typed(transfer(this.from, this.to, this.amount))
    expect(outcome.status, this.toString()).to.equal(succeeds ? 'completed' : 'reverted')

    expectAmount(await p.subject.balanceOf(this.from), m.balanceOf(this.from))
    expectAmount(await p.subject.balanceOf(this.to), m.balanceOf(this.to))
  }
  toString() {
    return `TRANSFER(${this.from}, ${this.to}, "${this.amount}")`
  }
}
