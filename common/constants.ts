import { BigNumber, utils } from 'ethers'

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000'

export const MAX_UINT256 = BigNumber.from(2).pow(256).sub(1)
export const UINT256_MODULUS = MAX_UINT256.add(1)

// Canonical accounts. Generators index into this list, so shrinking collapses toward ALICE.
export const ALICE = utils.getAddress('0x00000000000000000000000000000000000a11ce')
export const BOB = utils.getAddress('0x0000000000000000000000000000000000000b0b')
export const CAROL = utils.getAddress('0x00000000000000000000000000000000000ca201')
export const DAVE = utils.getAddress('0x0000000000000000000000000000000000000da7')

export const ACCOUNTS: readonly string[] = [ALICE, BOB, CAROL, DAVE]

// @dev EVM panic code for checked arithmetic (Panic(0x11))
export const PANIC_ARITHMETIC = 0x11

export enum CallMode {
  TYPED = 'typed',
  RAW = 'raw',
}

export enum Verdict {
  PASS = 'pass',
  FAIL = 'fail',
  INCONCLUSIVE = 'inconclusive',
}

export enum Diagnosis {
  VIOLATION = 'violation',
  COMPLETED_FALSE = 'completed-false',
  PRECONDITION_UNSATISFIABLE = 'precondition-unsatisfiable',
  TIMEOUT = 'timeout',
}
