import { TokenCaller } from '../../../harness/adapter/TokenCaller'
import { expectAmount } from '../../utils/matchers'
import { TokenCommand, TokenModel } from './TokenModel'

export class GetBalanceCommand implements TokenCommand {
  constructor(readonly account: string) {}
  async check() {
    return true
  }
  async run(m: TokenModel, p: TokenCaller) {
    expectAmount(await p.subject.balanceOf(this.account), m.balanceOf(this.account))
    expectAmount(await p.subject.totalSupply(), m.supply)
  }
  toString() {
    return `GETBALANCE(${this.account})`
  }
}
