import { Diagnosis, PANIC_ARITHMETIC } from '../common/constants'

// The subject aborted the call. No state change survives a Revert.
export class Revert extends Error {
  constructor(readonly reason: string) {
    super(`reverted: ${reason}`)
    this.name = 'Revert'
  }
}

// Checked-arithmetic failure in the state substrate, e.g. a balance written below zero
export class Panic extends Revert {
  constructor(readonly code: number = PANIC_ARITHMETIC) {
    super(`panic 0x${code.toString(16).padStart(2, '0')}`)
    this.name = 'Panic'
  }
}

export type ViolationKind = Diagnosis.VIOLATION | Diagnosis.COMPLETED_FALSE

export class PropertyViolation extends Error {
  constructor(
    readonly propertyId: string,
    readonly kind: ViolationKind,
    readonly detail: string
  ) {
    super(`${propertyId}: ${detail}`)
    this.name = 'PropertyViolation'
  }
}

export class EvaluationTimeout extends Error {
  constructor(readonly propertyId: string, readonly timeoutMs: number) {
    super(`${propertyId}: evaluation exceeded ${timeoutMs}ms`)
    this.name = 'EvaluationTimeout'
  }
}
