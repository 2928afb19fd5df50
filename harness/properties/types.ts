import fc from 'fast-check'
import { CallMode } from '../../common/constants'
import { ViolationKind } from '../errors'
import { CallOutcome, CallSpec, Scenario, Snapshot } from '../interface'

export type Violation = {
  kind: ViolationKind
  message: string
}

export type Context<C extends CallSpec> = {
  scenario: Scenario<C>
  pre: Snapshot
  outcome: CallOutcome
  post: Snapshot
}

/*
 * A property pairs a generator with a contract. The generator narrows inputs toward the
 * precondition; `precondition` filters what generation alone cannot guarantee. Nothing here
 * depends on how candidates are searched.
 */
export interface Property<C extends CallSpec = CallSpec> {
  id: string
  name: string
  description: string
  mode: CallMode
  // Failing setup calls are part of the explored history instead of a reason to discard
  tolerateSetupFailures?: boolean

  scenario(): fc.Arbitrary<Scenario<C>>
  precondition?(scenario: Scenario<C>, pre: Snapshot): boolean
  check(ctx: Context<C>): Violation | undefined
}
