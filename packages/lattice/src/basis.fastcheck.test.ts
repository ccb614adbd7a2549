import fc from 'fast-check'
import { describe, expect, it } from 'vitest'

import { basisMatrix, dual, realBasis, toReal, toReciprocal } from './basis'
import { dualityProduct, volume } from './geometry'
import { maxAbsDifference, scale, identity } from './matrix'

// Strictly diagonally dominant with a positive diagonal:
// nonsingular and right-handed.
const basisArb = fc
  .array(fc.double({ min: -1, max: 1, noNaN: true }), {
    minLength: 9,
    maxLength: 9,
  })
  .map((values) =>
    [0, 1, 2].map((i) =>
      [0, 1, 2].map((j) => values[i * 3 + j] + (i === j ? 3 : 0)),
    ),
  )

describe('lattice duality properties', () => {
  it('round-trips through reciprocal space', () => {
    fc.assert(
      fc.property(basisArb, (m) => {
        const real = realBasis(m)
        const back = basisMatrix(toReal(toReciprocal(real)))
        expect(maxAbsDifference(back, m)).toBeLessThan(1e-9)
        const twice = basisMatrix(dual(dual(real)))
        expect(maxAbsDifference(twice, m)).toBeLessThan(1e-9)
      }),
      { numRuns: 120 },
    )
  })

  it('produces 2π·I against its dual', () => {
    fc.assert(
      fc.property(basisArb, (m) => {
        const product = dualityProduct(realBasis(m))
        const expected = scale(identity(3), 2 * Math.PI)
        expect(maxAbsDifference(product, expected)).toBeLessThan(1e-9)
      }),
      { numRuns: 120 },
    )
  })

  it('keeps volume(real)·volume(reciprocal) = (2π)³', () => {
    fc.assert(
      fc.property(basisArb, (m) => {
        const real = realBasis(m)
        const product = volume(real) * volume(toReciprocal(real))
        expect(product / (2 * Math.PI) ** 3).toBeCloseTo(1, 9)
      }),
      { numRuns: 120 },
    )
  })
})
