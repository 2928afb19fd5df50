import { BigNumber } from 'ethers'

// The token under test. Typed methods throw `Revert` when the call aborts;
// `call` takes ABI-encoded calldata and returns ABI-encoded return data.
export interface ERC20Subject {
  readonly name: string

  // Test-only privileged credit, used to reach preconditions
  mint(to: string, amount: BigNumber): Promise<void>

  totalSupply(): Promise<BigNumber>
  balanceOf(account: string): Promise<BigNumber>
  allowance(owner: string, spender: string): Promise<BigNumber>

  transfer(sender: string, to: string, amount: BigNumber): Promise<boolean>
  transferFrom(sender: string, from: string, to: string, amount: BigNumber): Promise<boolean>
  approve(sender: string, spender: string, amount: BigNumber): Promise<boolean>

  call(sender: string, data: string): Promise<string>
}

export type SubjectFactory = () => ERC20Subject

// Calls

export type TransferCall = {
  op: 'transfer'
  sender: string
  to: string
  amount: BigNumber
}

export type TransferFromCall = {
  op: 'transferFrom'
  sender: string
  from: string
  to: string
  amount: BigNumber
}

export type ApproveCall = {
  op: 'approve'
  sender: string
  spender: string
  amount: BigNumber
}

export type TotalSupplyCall = { op: 'totalSupply' }

export type BalanceOfCall = { op: 'balanceOf'; account: string }

export type AllowanceCall = { op: 'allowance'; owner: string; spender: string }

export type MutatingCall = TransferCall | TransferFromCall | ApproveCall
export type ReadCall = TotalSupplyCall | BalanceOfCall | AllowanceCall
export type CallSpec = MutatingCall | ReadCall

export type MintCall = { op: 'mint'; to: string; amount: BigNumber }

// Setup runs before the call under test, through typed calls
export type SetupCall = MintCall | MutatingCall

// INVARIANT: a Scenario is fully concrete, so it reproduces its evaluation on its own.
export type Scenario<C extends CallSpec = CallSpec> = {
  setup: SetupCall[]
  call: C
}

// Outcomes

export type Reverted = {
  status: 'reverted'
  reason: string
}

export type Completed = {
  status: 'completed'
  returnData: string
  // Decoded bool of a mutating call; undefined when the subject returned no data
  result?: boolean
  // Decoded amount of a read
  value?: BigNumber
}

export type CallOutcome = Reverted | Completed

// State observed through the subject's read operations
export type Snapshot = {
  totalSupply: BigNumber
  balances: Map<string, BigNumber>
  // keyed by allowanceKey(owner, spender)
  allowances: Map<string, BigNumber>
}

export const allowanceKey = (owner: string, spender: string): string => `${owner}->${spender}`
