import { BigNumber, utils } from 'ethers'
import { CallMode, ZERO_ADDRESS } from '../../common/constants'
import { ERC20_INTERFACE } from '../abi'
import { Revert } from '../errors'
import {
  CallOutcome,
  CallSpec,
  ERC20Subject,
  MutatingCall,
  SetupCall,
  Snapshot,
  allowanceKey,
} from '../interface'

/*
 * Calls the subject in one of two modes:
 *
 * - TYPED: direct method calls. An abort surfaces as a `reverted` outcome, which the
 *   evaluation treats as "never happened".
 * - RAW: ABI-encoded dispatch through `subject.call`. Revert and a returned `false` stay
 *   distinct, and empty return data is reported as a completed call without a result.
 *
 * Only `Revert` is converted into an outcome; any other error escapes.
 */
export class TokenCaller {
  constructor(readonly subject: ERC20Subject) {}

  async mint(to: string, amount: BigNumber): Promise<void> {
    await this.subject.mint(to, amount)
  }

  async invoke(call: CallSpec, mode: CallMode): Promise<CallOutcome> {
    return mode === CallMode.RAW ? this.raw(call) : this.typed(call)
  }

  // Setup goes through typed calls, and a completed `false` counts as a failure too
  async setup(step: SetupCall): Promise<CallOutcome> {
    if (step.op === 'mint') {
      const { to, amount } = step
      return reverts(async () => {
        await this.mint(to, amount)
        return { status: 'completed', returnData: '0x' }
      })
    }
    return this.typed(step)
  }

  async typed(call: CallSpec): Promise<CallOutcome> {
    return reverts(async () => {
      switch (call.op) {
        case 'totalSupply':
          return completedValue(await this.subject.totalSupply())
        case 'balanceOf':
          return completedValue(await this.subject.balanceOf(call.account))
        case 'allowance':
          return completedValue(await this.subject.allowance(call.owner, call.spender))
        case 'transfer':
          return completedResult(await this.subject.transfer(call.sender, call.to, call.amount))
        case 'transferFrom':
          return completedResult(
            await this.subject.transferFrom(call.sender, call.from, call.to, call.amount)
          )
        case 'approve':
          return completedResult(
            await this.subject.approve(call.sender, call.spender, call.amount)
          )
      }
    })
  }

  async raw(call: CallSpec): Promise<CallOutcome> {
    const [sender, data] = encodeCall(call)
    return reverts(async () => {
      const returnData = await this.subject.call(sender, data)
      return decodeReturn(call, returnData)
    })
  }

  async snapshot(universe: readonly string[]): Promise<Snapshot> {
    const balances = new Map<string, BigNumber>()
    const allowances = new Map<string, BigNumber>()
    for (const account of universe) {
      balances.set(account, await this.subject.balanceOf(account))
    }
    for (const owner of universe) {
      for (const spender of universe) {
        allowances.set(allowanceKey(owner, spender), await this.subject.allowance(owner, spender))
      }
    }
    return { totalSupply: await this.subject.totalSupply(), balances, allowances }
  }
}

async function reverts(fn: () => Promise<CallOutcome>): Promise<CallOutcome> {
  try {
    return await fn()
  } catch (e) {
    if (e instanceof Revert) return { status: 'reverted', reason: e.reason }
    throw e
  }
}

const completedValue = (value: BigNumber): CallOutcome => ({
  status: 'completed',
  returnData: utils.defaultAbiCoder.encode(['uint256'], [value]),
  value,
})

const completedResult = (result: boolean): CallOutcome => ({
  status: 'completed',
  returnData: utils.defaultAbiCoder.encode(['bool'], [result]),
  result,
})

// Reads have no sender; the null address stands in for it
function encodeCall(call: CallSpec): [string, string] {
  const sender = isMutating(call) ? call.sender : ZERO_ADDRESS
  switch (call.op) {
    case 'totalSupply':
      return [sender, ERC20_INTERFACE.encodeFunctionData('totalSupply')]
    case 'balanceOf':
      return [sender, ERC20_INTERFACE.encodeFunctionData('balanceOf', [call.account])]
    case 'allowance':
      return [sender, ERC20_INTERFACE.encodeFunctionData('allowance', [call.owner, call.spender])]
    case 'transfer':
      return [sender, ERC20_INTERFACE.encodeFunctionData('transfer', [call.to, call.amount])]
    case 'transferFrom':
      return [
        sender,
        ERC20_INTERFACE.encodeFunctionData('transferFrom', [call.from, call.to, call.amount]),
      ]
    case 'approve':
      return [sender, ERC20_INTERFACE.encodeFunctionData('approve', [call.spender, call.amount])]
  }
}

function decodeReturn(call: CallSpec, returnData: string): CallOutcome {
  if (returnData === '0x') return { status: 'completed', returnData }

  const decoded = ERC20_INTERFACE.decodeFunctionResult(call.op, returnData)
  const first: unknown = decoded[0]
  if (isMutating(call)) {
    if (typeof first !== 'boolean') throw new Error(`${call.op} returned non-bool data ${returnData}`)
    return { status: 'completed', returnData, result: first }
  }
  if (!BigNumber.isBigNumber(first)) {
    throw new Error(`${call.op} returned non-uint256 data ${returnData}`)
  }
  return { status: 'completed', returnData, value: first }
}

export const isMutating = (call: CallSpec): call is MutatingCall =>
  call.op === 'transfer' || call.op === 'transferFrom' || call.op === 'approve'
