import fc from 'fast-check'
import { expect } from 'chai'
import { TokenModel } from './system0-model/TokenModel'
import { TokenCommands } from './system0-model/TokenCommands'
import { TokenCaller } from '../../harness/adapter/TokenCaller'
import { ERC20FalseReturnMock, ERC20Model } from '../../harness/subjects'
import { ERC20Subject } from '../../harness/interface'

const modelRun = (subject: () => ERC20Subject) =>
  fc.asyncProperty(TokenCommands, async (commands) => {
    const model = new TokenModel()
    const real = new TokenCaller(subject())
    await fc.asyncModelRun(() => ({ model, real }), commands)
  })

describe('Token Fuzz Test', () => {
  it('Should run commands correctly', async function () {
    await fc.assert(modelRun(() => new ERC20Model()), { numRuns: 100, seed: 5 })
  })

  it('Should catch a token that diverges from the model', async function () {
    const details = await fc.check(modelRun(() => new ERC20FalseReturnMock()), {
      numRuns: 100,
      seed: 5,
    })
    expect(details.failed).to.equal(true)
  })
})
