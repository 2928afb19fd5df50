import { expect } from 'chai'
import fc from 'fast-check'
import { Diagnosis, Verdict, ZERO_ADDRESS } from '../../common/constants'
import { nonNullAddress } from '../../harness/arbitraries'
import {
  PROPERTIES,
  findProperty,
  transferFromChangesOnlyParties,
} from '../../harness/properties'
import { formatResult, runProperty } from '../../harness/runner'
import { ERC20Model } from '../../harness/subjects'
import { expectEqualArrays } from '../utils/matchers'

// Unreachable under a token whose mint keeps totalSupply within uint256
const NEEDS_UNCAPPED_SUPPLY = ['ERC20-STDPROP-18', 'ERC20-STDPROP-32']

describe('Property catalog', () => {
  it('numbers ids sequentially from 01 to 37', () => {
    const expected = Array.from(
      { length: 37 },
      (_, i) => `ERC20-STDPROP-${String(i + 1).padStart(2, '0')}`
    )
    expectEqualArrays(
      PROPERTIES.map((p) => p.id),
      expected
    )
  })

  it('has unique kebab-case names', () => {
    const names = PROPERTIES.map((p) => p.name)
    expect(new Set(names).size).to.equal(names.length)
    for (const name of names) expect(name).to.match(/^[a-z0-9]+(-[a-z0-9]+)*$/)
  })

  describe('findProperty', () => {
    it('finds by id, number or name', () => {
      expect(findProperty('ERC20-STDPROP-35').name).to.equal('approve-sets-allowance')
      expect(findProperty('7').name).to.equal('transfer-to-null-reverts')
      expect(findProperty('07').name).to.equal('transfer-to-null-reverts')
      expect(findProperty('approve-overwrites-allowance').id).to.equal('ERC20-STDPROP-36')
    })

    it('throws on unknown keys', () => {
      expect(() => findProperty('99')).to.throw('Unknown property 99')
      expect(() => findProperty('no-such-property')).to.throw('Unknown property no-such-property')
    })
  })

  describe('against the reference token', () => {
    const factory = () => new ERC20Model()

    for (const property of PROPERTIES) {
      if (NEEDS_UNCAPPED_SUPPLY.includes(property.id)) {
        it(`${property.id} ${property.name} is inconclusive`, async () => {
          const result = await runProperty(property, factory, {
            numRuns: 10,
            maxSkipsPerRun: 10,
            seed: 7,
          })
          expect(result.verdict).to.equal(Verdict.INCONCLUSIVE)
          expect(result.diagnosis).to.equal(Diagnosis.PRECONDITION_UNSATISFIABLE)
          expect(result.numRuns).to.equal(0)
          expect(result.witness).to.equal(undefined)
        })
      } else {
        it(`${property.id} ${property.name} passes`, async () => {
          const result = await runProperty(property, factory, { numRuns: 30, seed: 7 })
          expect(result.verdict, formatResult(result)).to.equal(Verdict.PASS)
          expect(result.numRuns).to.equal(30)
        })
      }
    }
  })

  describe('scenario domains', () => {
    it('never draws the null address as a non-null address', () => {
      for (const addr of fc.sample(nonNullAddress(), { numRuns: 1000, seed: 1 })) {
        expect(addr).to.not.equal(ZERO_ADDRESS)
      }
    })

    it('never shrinks a non-null address to the null address', () => {
      for (let seed = 1; seed <= 20; seed++) {
        const details = fc.check(
          fc.property(nonNullAddress(), () => false),
          { seed }
        )
        expect(details.failed).to.equal(true)
        expect(details.counterexample?.[0]).to.not.equal(ZERO_ADDRESS)
      }
    })

    it('keeps the spent allowance as the only approval of the spender', () => {
      const scenarios = fc.sample(transferFromChangesOnlyParties.scenario(), {
        numRuns: 200,
        seed: 3,
      })
      for (const { setup, call } of scenarios) {
        const approvals = setup.filter(
          (step) =>
            step.op === 'approve' && step.sender === call.from && step.spender === call.sender
        )
        expect(approvals).to.have.length(1)
        expect(approvals[0]).to.deep.equal({
          op: 'approve',
          sender: call.from,
          spender: call.sender,
          amount: call.amount,
        })
      }
    })
  })
})
