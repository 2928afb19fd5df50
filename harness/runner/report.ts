import { Verdict } from '../../common/constants'
import { shortAmount } from '../../common/numbers'
import { CallOutcome, CallSpec, SetupCall } from '../interface'
import { PropertyResult } from './PropertyRunner'

export function describeCall(call: SetupCall | CallSpec): string {
  switch (call.op) {
    case 'mint':
      return `mint(${call.to}, ${shortAmount(call.amount)})`
    case 'transfer':
      return `${call.sender}: transfer(${call.to}, ${shortAmount(call.amount)})`
    case 'transferFrom':
      return `${call.sender}: transferFrom(${call.from}, ${call.to}, ${shortAmount(call.amount)})`
    case 'approve':
      return `${call.sender}: approve(${call.spender}, ${shortAmount(call.amount)})`
    case 'totalSupply':
      return 'totalSupply()'
    case 'balanceOf':
      return `balanceOf(${call.account})`
    case 'allowance':
      return `allowance(${call.owner}, ${call.spender})`
  }
}

export function describeOutcome(outcome: CallOutcome): string {
  if (outcome.status === 'reverted') return `reverted (${outcome.reason})`
  if (outcome.value) return `returned ${shortAmount(outcome.value)}`
  if (outcome.result !== undefined) return `returned ${outcome.result}`
  return 'completed without return data'
}

// One line, plus the witness when the property failed
export function formatResult(result: PropertyResult): string {
  const verdict = result.verdict.toUpperCase().padEnd(12)
  const diagnosis = result.diagnosis ? ` [${result.diagnosis}]` : ''
  const head = `${verdict} ${result.id} ${result.name}${diagnosis} (${result.numRuns} runs, ${result.numSkips} skipped)`

  const { witness } = result
  if (!witness) return head
  const lines = [
    head,
    `    ${witness.message}`,
    ...witness.scenario.setup.map((step, i) => `    setup ${i}: ${describeCall(step)}`),
    `    call: ${describeCall(witness.scenario.call)} -> ${describeOutcome(witness.outcome)}`,
    `    replay with seed ${result.seed}${result.path ? `, path "${result.path}"` : ''}`,
  ]
  return lines.join('\n')
}

export function formatSummary(subject: string, results: readonly PropertyResult[]): string {
  const count = (verdict: Verdict) => results.filter((r) => r.verdict === verdict).length
  return (
    `${subject}: ${results.length} properties, ${count(Verdict.PASS)} passed, ` +
    `${count(Verdict.FAIL)} failed, ${count(Verdict.INCONCLUSIVE)} inconclusive`
  )
}
