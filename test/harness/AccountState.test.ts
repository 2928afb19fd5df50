import { expect } from 'chai'
import { ALICE, BOB, MAX_UINT256, UINT256_MODULUS } from '../../common/constants'
import { bn } from '../../common/numbers'
import { Panic, Revert } from '../../harness/errors'
import { AccountState } from '../../harness/state/AccountState'
import { expectAmount } from '../utils/matchers'

describe('AccountState', () => {
  let state: AccountState

  beforeEach(() => {
    state = new AccountState()
  })

  describe('reads', () => {
    it('returns zero for unknown accounts and pairs', () => {
      expectAmount(state.balanceOf(ALICE), 0)
      expectAmount(state.allowanceOf(ALICE, BOB), 0)
      expectAmount(state.totalSupply(), 0)
      expect(state.accounts()).to.deep.equal([])
    })

    it('normalizes addresses', () => {
      state.setBalance(ALICE.toLowerCase(), bn(7))
      expectAmount(state.balanceOf(ALICE), 7)
      expect(state.accounts()).to.deep.equal([ALICE])

      state.setAllowance(ALICE.toLowerCase(), BOB.toLowerCase(), bn(3))
      expectAmount(state.allowanceOf(ALICE, BOB), 3)
      expectAmount(state.allowanceOf(BOB, ALICE), 0)
    })
  })

  describe('range guard', () => {
    it('accepts both ends of the uint256 range', () => {
      state.setBalance(ALICE, MAX_UINT256)
      state.setTotalSupply(bn(0))
      expectAmount(state.balanceOf(ALICE), MAX_UINT256)
      expectAmount(state.totalSupply(), 0)
    })

    it('panics on negative values', () => {
      expect(() => state.setBalance(ALICE, bn(-1))).to.throw(Panic, 'panic 0x11')
      expect(() => state.setAllowance(ALICE, BOB, bn(-1))).to.throw(Panic)
    })

    it('panics above MAX_UINT256', () => {
      expect(() => state.setTotalSupply(UINT256_MODULUS)).to.throw(Panic)
      expectAmount(state.totalSupply(), 0)
    })

    it('reports a Panic as a revert', () => {
      expect(() => state.setBalance(ALICE, bn(-1))).to.throw(Revert)
    })
  })

  describe('atomically', () => {
    it('keeps the writes of a call that returns', () => {
      const result = state.atomically(() => {
        state.setBalance(ALICE, bn(10))
        state.setTotalSupply(bn(10))
        return 'done'
      })
      expect(result).to.equal('done')
      expectAmount(state.balanceOf(ALICE), 10)
      expectAmount(state.totalSupply(), 10)
    })

    it('rolls back every write of a call that throws, and rethrows', () => {
      state.setBalance(ALICE, bn(5))
      expect(() =>
        state.atomically(() => {
          state.setBalance(ALICE, bn(1))
          state.setBalance(BOB, bn(4))
          state.setAllowance(ALICE, BOB, bn(9))
          state.setTotalSupply(bn(5))
          throw new Revert('nope')
        })
      ).to.throw(Revert, 'reverted: nope')

      expectAmount(state.balanceOf(ALICE), 5)
      expectAmount(state.balanceOf(BOB), 0)
      expectAmount(state.allowanceOf(ALICE, BOB), 0)
      expectAmount(state.totalSupply(), 0)
      expect(state.accounts()).to.deep.equal([ALICE])
    })

    it('rolls back the writes before a Panic', () => {
      expect(() =>
        state.atomically(() => {
          state.setBalance(ALICE, bn(1))
          state.setBalance(BOB, MAX_UINT256.add(1))
        })
      ).to.throw(Panic)
      expectAmount(state.balanceOf(ALICE), 0)
    })

    it('joins nested calls to the outermost one', () => {
      expect(() =>
        state.atomically(() => {
          state.atomically(() => state.setBalance(ALICE, bn(1)))
          expectAmount(state.balanceOf(ALICE), 1)
          throw new Error('outer fails')
        })
      ).to.throw('outer fails')
      expectAmount(state.balanceOf(ALICE), 0)
    })

    it('is usable again after a rollback', () => {
      expect(() =>
        state.atomically(() => {
          throw new Revert('first')
        })
      ).to.throw(Revert)
      state.atomically(() => state.setBalance(BOB, bn(2)))
      expectAmount(state.balanceOf(BOB), 2)
    })
  })
})
