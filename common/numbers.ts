import { BigNumber, BigNumberish } from 'ethers'
import { MAX_UINT256, UINT256_MODULUS } from './constants'

export const ZERO = BigNumber.from(0)

// Convenience form for "BigNumber.from" that also accepts scientific notation
export const bn = (x: BigNumberish): BigNumber => {
  if (typeof x === 'string') return _parseScientific(x)
  return BigNumber.from(x)
}

export const pow10 = (exponent: BigNumberish): BigNumber => {
  return BigNumber.from(10).pow(exponent)
}

export const isUint256 = (x: BigNumber): boolean => x.gte(ZERO) && x.lte(MAX_UINT256)

// uint256 arithmetic. Each result carries its wrap flag; nothing here throws on overflow.

// a + b mod 2^256, and whether the true sum exceeded MAX_UINT256
export const overflowingAdd = (a: BigNumber, b: BigNumber): [BigNumber, boolean] => {
  const sum = a.add(b)
  if (sum.gt(MAX_UINT256)) return [sum.sub(UINT256_MODULUS), true]
  return [sum, false]
}

// a - b mod 2^256, and whether b > a
export const overflowingSub = (a: BigNumber, b: BigNumber): [BigNumber, boolean] => {
  if (a.lt(b)) return [a.add(UINT256_MODULUS).sub(b), true]
  return [a.sub(b), false]
}

export const checkedAdd = (a: BigNumber, b: BigNumber): BigNumber | undefined => {
  const [sum, overflowed] = overflowingAdd(a, b)
  return overflowed ? undefined : sum
}

export const checkedSub = (a: BigNumber, b: BigNumber): BigNumber | undefined => {
  const [diff, underflowed] = overflowingSub(a, b)
  return underflowed ? undefined : diff
}

// Human-readable amount: near-max values are written relative to MAX_UINT256
export function shortAmount(x: BigNumber): string {
  const distance = MAX_UINT256.sub(x)
  if (distance.isZero()) return 'MAX_UINT256'
  if (distance.gte(ZERO) && distance.lt(pow10(6))) return `MAX_UINT256 - ${distance.toString()}`
  return x.toString()
}

// _parseScientific(s, scale) returns a BigNumber with value (s * 10**scale),
// where s is a string in decimal or scientific notation,
// and scale is a BigNumberish indicating a number of additional zeroes to add to the right,
// Fractional digits in the result are truncated.
// TODO: Maybe we should error if we're truncating digits instead?
//
// A few examples:
//     _parseScientific('1.4e2') == BigNumber.from(140)
//     _parseScientific('-2') == BigNumber.from(-2)
//     _parseScientific('0.5', 18) == BigNumber.from(5).mul(pow10(17))
//     _parseScientific('0.127e2') == BigNumber.from(12)
function _parseScientific(s: string, scale: BigNumberish = 0): BigNumber {
  // Scientific Notation: <INT>(.<DIGITS>)?(e<INT>)?
  // INT: [+-]?DIGITS
  // DIGITS: \d+
  const match = s.match(
    /^(?<sign>[+-]?)(?<int_part>\d+)(\.(?<frac_part>\d+))?(e(?<exponent>[+-]?\d+))?$/
  )
  if (!match || !match.groups) throw new Error(`Illegal decimal string ${s}`)

  let sign = match.groups.sign === '-' ? -1 : 1
  let int_part = BigNumber.from(match.groups.int_part)
  const frac_part = match.groups.frac_part ? BigNumber.from(match.groups.frac_part) : ZERO
  let exponent = match.groups.exponent ? BigNumber.from(match.groups.exponent) : ZERO
  exponent = exponent.add(scale)

  // "zero" the fractional part by shifting it into int_part, keeping the overall value equal
  if (!frac_part.eq(ZERO)) {
    const shift_digits = match.groups.frac_part.length
    int_part = int_part.mul(pow10(shift_digits)).add(frac_part)
    exponent = exponent.sub(shift_digits)
  }

  // Shift int_part left or right as exponent requires
  const positive_output: BigNumber = exponent.gte(ZERO)
    ? int_part.mul(pow10(exponent))
    : int_part.div(pow10(exponent.abs()))

  return positive_output.mul(sign)
}
