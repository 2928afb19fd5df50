import { expect } from 'chai'
import { BigNumber, BigNumberish } from 'ethers'
import { MAX_UINT256 } from './constants'
import {
  bn,
  checkedAdd,
  checkedSub,
  isUint256,
  overflowingAdd,
  overflowingSub,
  shortAmount,
} from './numbers'

const str = (x: BigNumberish): string => BigNumber.from(x).toString()

describe('bn', () => {
  const table: [BigNumberish, BigNumberish][] = [
    ['1.0', 1n],
    ['1.1', 1n],
    ['-1', -1],
    ['-61.4', -61],
    ['000000000', 0],
    ['1e18', 10n ** 18n],
    ['1e77', 10n ** 77n],
    ['123456789e-7', 12],
    ['22e-1', 2],
    ['999e-2', 9],
    ['321', 321],
  ]
  for (const [input, output] of table) {
    it(`parses ${input}`, () => {
      expect(bn(input).toString(), `bn(${input})`).to.equal(str(output))
    })
  }

  const errorTable: string[] = ['.', '1.', '.3', '+', 'a', '', ' ', 'two', '3f2', '1.2x']
  for (const input of errorTable) {
    it(`fails on "${input}"`, () => {
      expect(() => bn(input), `bn(${input})`).to.throw('Illegal decimal string')
    })
  }
})

describe('overflowingAdd', () => {
  const table: [BigNumber, BigNumber, string, boolean][] = [
    [bn(0), bn(0), '0', false],
    [bn(2), bn(3), '5', false],
    [MAX_UINT256, bn(0), MAX_UINT256.toString(), false],
    [MAX_UINT256.sub(50), bn(50), MAX_UINT256.toString(), false],
    [MAX_UINT256, bn(1), '0', true],
    [MAX_UINT256.sub(50), bn(60), '9', true],
    [MAX_UINT256, MAX_UINT256, MAX_UINT256.sub(1).toString(), true],
  ]
  for (const [a, b, sum, overflowed] of table) {
    it(`${shortAmount(a)} + ${shortAmount(b)}`, () => {
      const [result, flag] = overflowingAdd(a, b)
      expect(result.toString()).to.equal(sum)
      expect(flag).to.equal(overflowed)
      expect(checkedAdd(a, b)?.toString()).to.equal(overflowed ? undefined : sum)
    })
  }
})

describe('overflowingSub', () => {
  const table: [BigNumber, BigNumber, string, boolean][] = [
    [bn(5), bn(3), '2', false],
    [bn(3), bn(3), '0', false],
    [MAX_UINT256, MAX_UINT256, '0', false],
    [bn(0), bn(1), MAX_UINT256.toString(), true],
    [bn(50), bn(200), MAX_UINT256.sub(149).toString(), true],
  ]
  for (const [a, b, diff, underflowed] of table) {
    it(`${shortAmount(a)} - ${shortAmount(b)}`, () => {
      const [result, flag] = overflowingSub(a, b)
      expect(result.toString()).to.equal(diff)
      expect(flag).to.equal(underflowed)
      expect(checkedSub(a, b)?.toString()).to.equal(underflowed ? undefined : diff)
    })
  }
})

describe('isUint256', () => {
  it('accepts the full range', () => {
    expect(isUint256(bn(0))).to.equal(true)
    expect(isUint256(MAX_UINT256)).to.equal(true)
  })

  it('rejects values outside the range', () => {
    expect(isUint256(bn(-1))).to.equal(false)
    expect(isUint256(MAX_UINT256.add(1))).to.equal(false)
  })
})

describe('shortAmount', () => {
  it('writes near-max values relative to MAX_UINT256', () => {
    expect(shortAmount(MAX_UINT256)).to.equal('MAX_UINT256')
    expect(shortAmount(MAX_UINT256.sub(50))).to.equal('MAX_UINT256 - 50')
  })

  it('writes other values in decimal', () => {
    expect(shortAmount(bn(0))).to.equal('0')
    expect(shortAmount(bn('1e18'))).to.equal('1000000000000000000')
  })
})
