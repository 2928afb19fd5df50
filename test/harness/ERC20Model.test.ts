import { expect } from 'chai'
import { utils } from 'ethers'
import { ALICE, BOB, CAROL, MAX_UINT256, ZERO_ADDRESS } from '../../common/constants'
import { bn } from '../../common/numbers'
import { ERC20_INTERFACE } from '../../harness/abi'
import { Panic, Revert } from '../../harness/errors'
import { ERC20Model } from '../../harness/subjects'
import { expectAmount } from '../utils/matchers'

const expectRevert = async (promise: Promise<unknown>, reason: string) => {
  let caught: unknown
  try {
    await promise
  } catch (e) {
    caught = e
  }
  expect(caught).to.be.instanceOf(Revert)
  if (caught instanceof Revert) expect(caught.reason).to.equal(reason)
}

describe('ERC20Model', () => {
  let token: ERC20Model

  beforeEach(async () => {
    token = new ERC20Model()
    await token.mint(ALICE, bn('100'))
  })

  describe('mint', () => {
    it('credits the account and the supply', async () => {
      await token.mint(BOB, bn('50'))
      expectAmount(await token.balanceOf(BOB), 50)
      expectAmount(await token.totalSupply(), 150)
    })

    it('reverts when minting to the null address', async () => {
      await expectRevert(token.mint(ZERO_ADDRESS, bn(1)), 'ERC20: mint to the zero address')
    })

    it('panics when the supply would pass MAX_UINT256, leaving state as is', async () => {
      await expectRevert(token.mint(BOB, MAX_UINT256), 'panic 0x11')
      expectAmount(await token.balanceOf(BOB), 0)
      expectAmount(await token.totalSupply(), 100)
    })
  })

  describe('transfer', () => {
    it('moves the amount and returns true', async () => {
      expect(await token.transfer(ALICE, BOB, bn(30))).to.equal(true)
      expectAmount(await token.balanceOf(ALICE), 70)
      expectAmount(await token.balanceOf(BOB), 30)
      expectAmount(await token.totalSupply(), 100)
    })

    it('accepts addresses in any case', async () => {
      expect(await token.transfer(ALICE.toLowerCase(), BOB.toLowerCase(), bn(1))).to.equal(true)
      expectAmount(await token.balanceOf(BOB), 1)
    })

    it('keeps the balance on a self-transfer', async () => {
      expect(await token.transfer(ALICE, ALICE, bn(100))).to.equal(true)
      expectAmount(await token.balanceOf(ALICE), 100)
    })

    it('allows zero-amount transfers', async () => {
      expect(await token.transfer(BOB, CAROL, bn(0))).to.equal(true)
      expectAmount(await token.balanceOf(CAROL), 0)
    })

    it('reverts on insufficient balance', async () => {
      await expectRevert(
        token.transfer(ALICE, BOB, bn(101)),
        'ERC20: transfer amount exceeds balance'
      )
      expectAmount(await token.balanceOf(ALICE), 100)
    })

    it('reverts on the null address', async () => {
      await expectRevert(
        token.transfer(ALICE, ZERO_ADDRESS, bn(1)),
        'ERC20: transfer to the zero address'
      )
      await expectRevert(
        token.transfer(ZERO_ADDRESS, ALICE, bn(0)),
        'ERC20: transfer from the zero address'
      )
    })
  })

  describe('approve and transferFrom', () => {
    it('sets and overwrites allowances', async () => {
      expect(await token.approve(ALICE, BOB, bn(10))).to.equal(true)
      expectAmount(await token.allowance(ALICE, BOB), 10)
      await token.approve(ALICE, BOB, bn(3))
      expectAmount(await token.allowance(ALICE, BOB), 3)
    })

    it('reverts when approving the null address', async () => {
      await expectRevert(
        token.approve(ALICE, ZERO_ADDRESS, bn(1)),
        'ERC20: approve to the zero address'
      )
    })

    it('spends a finite allowance', async () => {
      await token.approve(ALICE, BOB, bn(40))
      expect(await token.transferFrom(BOB, ALICE, CAROL, bn(25))).to.equal(true)
      expectAmount(await token.allowance(ALICE, BOB), 15)
      expectAmount(await token.balanceOf(ALICE), 75)
      expectAmount(await token.balanceOf(CAROL), 25)
    })

    it('never spends an unlimited allowance', async () => {
      await token.approve(ALICE, BOB, MAX_UINT256)
      await token.transferFrom(BOB, ALICE, CAROL, bn(25))
      expectAmount(await token.allowance(ALICE, BOB), MAX_UINT256)
    })

    it('reverts on insufficient allowance, leaving state as is', async () => {
      await token.approve(ALICE, BOB, bn(5))
      await expectRevert(
        token.transferFrom(BOB, ALICE, CAROL, bn(6)),
        'ERC20: insufficient allowance'
      )
      expectAmount(await token.allowance(ALICE, BOB), 5)
      expectAmount(await token.balanceOf(ALICE), 100)
    })

    it('rolls back the spent allowance when the balance is short', async () => {
      await token.approve(ALICE, BOB, bn(500))
      await expectRevert(
        token.transferFrom(BOB, ALICE, CAROL, bn(200)),
        'ERC20: transfer amount exceeds balance'
      )
      expectAmount(await token.allowance(ALICE, BOB), 500)
    })

    it('lets a zero-amount transferFrom through without allowance', async () => {
      expect(await token.transferFrom(BOB, ALICE, CAROL, bn(0))).to.equal(true)
    })
  })

  describe('call', () => {
    it('dispatches encoded calldata and encodes the result', async () => {
      const data = ERC20_INTERFACE.encodeFunctionData('transfer', [BOB, 10])
      const returned = await token.call(ALICE, data)
      expect(returned).to.equal(utils.defaultAbiCoder.encode(['bool'], [true]))
      expectAmount(await token.balanceOf(BOB), 10)
    })

    it('encodes reads', async () => {
      const data = ERC20_INTERFACE.encodeFunctionData('balanceOf', [ALICE])
      const [value] = ERC20_INTERFACE.decodeFunctionResult('balanceOf', await token.call(BOB, data))
      expect(value.toString()).to.equal('100')
    })

    it('reverts on unknown selectors', async () => {
      await expectRevert(token.call(ALICE, '0xdeadbeef'), 'unrecognized calldata 0xdeadbeef')
    })

    it('propagates reverts', async () => {
      const data = ERC20_INTERFACE.encodeFunctionData('transfer', [BOB, 101])
      await expectRevert(token.call(ALICE, data), 'ERC20: transfer amount exceeds balance')
    })
  })

  it('reports a Panic as a revert with its code', async () => {
    const panic = new Panic()
    expect(panic.reason).to.equal('panic 0x11')
    expect(panic.message).to.equal('reverted: panic 0x11')
  })
})
