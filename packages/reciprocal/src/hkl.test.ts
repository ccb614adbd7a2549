import { reciprocalBasis } from '@kspace/lattice'
import { describe, expect, it } from 'vitest'

import { realField } from './field'
import { createMillerGrid } from './grid'
import {
  hklBounds,
  hklDimension,
  hklEntries,
  hklGet,
  hklSet,
  toDense,
  toSparse,
} from './hkl'
import type { HklData } from './hkl'
import { createSparseMap } from './sparse'

const basis = reciprocalBasis([[1]])

const variants = (): Array<HklData<number>> => [
  createMillerGrid(basis, realField, [3], [0, 4, 6]),
  createSparseMap(realField, 1, [
    [[1], 4],
    [[-1], 6],
  ]),
]

describe('HklData', () => {
  it('reads the same values from either representation', () => {
    for (const data of variants()) {
      expect(hklGet(data, [1])).toBe(4)
      expect(hklGet(data, [-1])).toBe(6)
      expect(hklGet(data, [0])).toBe(0)
      expect(hklDimension(data)).toBe(1)
    }
  })

  it('writes through either representation', () => {
    for (const data of variants()) {
      hklSet(data, [0], 2)
      expect(hklGet(data, [0])).toBe(2)
    }
  })

  it('reports bounds', () => {
    const [dense, sparse] = variants()
    expect(hklBounds(dense)).toEqual([{ min: -1, max: 1 }])
    expect(hklBounds(sparse)).toEqual([{ min: -1, max: 1 }])
    expect(hklBounds(createSparseMap(realField, 2))).toBeNull()
  })

  it('enumerates all dense entries but only stored sparse entries', () => {
    const [dense, sparse] = variants()
    expect(Array.from(hklEntries(dense))).toEqual([
      [[0], 0],
      [[1], 4],
      [[-1], 6],
    ])
    expect(Array.from(hklEntries(sparse))).toEqual([
      [[1], 4],
      [[-1], 6],
    ])
  })

  it('converts between representations', () => {
    const [dense, sparse] = variants()
    expect(toDense(dense)).toBe(dense)
    expect(toSparse(sparse)).toBe(sparse)
    expect(toDense(sparse).data).toEqual([0, 4, 6])
    expect(toSparse(dense).entries.size).toBe(2)
  })
})
