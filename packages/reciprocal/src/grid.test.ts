import { realBasis, reciprocalBasis } from '@kspace/lattice'
import {
  ConsistencyError,
  ConstructionError,
  IndexRangeError,
} from '@kspace/shared'
import { describe, expect, it } from 'vitest'

import { complex, complexField, realField } from './field'
import {
  createMillerGrid,
  gridAbs,
  gridAbs2,
  gridEntries,
  gridFromBounds,
  gridGet,
  gridSet,
  gridsApproxEqual,
  gridsEqual,
  indexAtOffset,
  mapGrid,
  storageAt,
  storageRanges,
  voxelSize,
  zerosGrid,
} from './grid'

const unit2 = () => reciprocalBasis([[1, 0], [0, 1]])
const unit1 = () => reciprocalBasis([[1]])
const unit2x = () => reciprocalBasis([[2]])

// size [3, 2]: axis 0 spans -1..1, axis 1 spans -1..0
const sample = () =>
  createMillerGrid(unit2(), realField, [3, 2], [0, 1, 2, 3, 4, 5])

describe('createMillerGrid', () => {
  it('centers the logical window by default', () => {
    expect(sample().bounds).toEqual([
      { min: -1, max: 1 },
      { min: -1, max: 0 },
    ])
    expect(storageRanges(sample())).toEqual([
      { min: 0, max: 2 },
      { min: 0, max: 1 },
    ])
  })

  it('converts a real basis to its reciprocal', () => {
    const real = realBasis([[2 * Math.PI]])
    const grid = createMillerGrid(real, realField, [1], [0])
    expect(grid.basis.space).toBe('reciprocal')
    expect(grid.basis.vectors[0][0]).toBeCloseTo(1, 12)
  })

  it('copies the input data', () => {
    const data = [1, 2]
    const grid = createMillerGrid(unit1(), realField, [2], data)
    data[0] = 9
    expect(gridGet(grid, [0])).toBe(1)
  })

  it('rejects inconsistent inputs', () => {
    expect(() => createMillerGrid(unit2(), realField, [3], [0, 1, 2])).toThrow(
      ConstructionError,
    )
    expect(() => createMillerGrid(unit1(), realField, [3], [0, 1])).toThrow(
      'grid data length does not match the grid size',
    )
    expect(() => createMillerGrid(unit1(), realField, [0], [])).toThrow(
      ConstructionError,
    )
    expect(() =>
      createMillerGrid(unit1(), realField, [3], [0, 1, 2], {
        bounds: [{ min: 0, max: 3 }],
      }),
    ).toThrow(ConstructionError)
  })
})

describe('Miller indexing', () => {
  it('places index i at storage offset i mod n', () => {
    const grid = sample()
    expect(gridGet(grid, [0, 0])).toBe(0)
    expect(gridGet(grid, [-1, 0])).toBe(2)
    expect(gridGet(grid, [1, -1])).toBe(4)
    expect(gridGet(grid, [-1, -1])).toBe(5)
  })

  it('wraps indices outside the window', () => {
    const grid = sample()
    expect(gridGet(grid, [4, 0])).toBe(gridGet(grid, [1, 0]))
    expect(gridGet(grid, [0, 2])).toBe(gridGet(grid, [0, 0]))
  })

  it('writes through to storage', () => {
    const grid = sample()
    gridSet(grid, [-1, -1], 42)
    expect(grid.data[5]).toBe(42)
    expect(storageAt(grid, -1)).toBe(42)
  })

  it('wraps linear storage offsets', () => {
    const grid = sample()
    expect(storageAt(grid, 6)).toBe(0)
    expect(storageAt(grid, 4)).toBe(4)
  })

  it('throws for out-of-window indices in strict mode', () => {
    const grid = createMillerGrid(
      unit2(),
      realField,
      [3, 2],
      [0, 1, 2, 3, 4, 5],
      { indexMode: 'strict' },
    )
    expect(gridGet(grid, [1, 0])).toBe(1)
    expect(() => gridGet(grid, [2, 0])).toThrow(IndexRangeError)
    expect(() => gridSet(grid, [0, 1], 7)).toThrow(IndexRangeError)
  })

  it('honors a custom logical window', () => {
    const grid = createMillerGrid(unit1(), realField, [3], [10, 11, 12], {
      bounds: [{ min: -5, max: -3 }],
    })
    expect(gridGet(grid, [-3])).toBe(10)
    expect(gridGet(grid, [-5])).toBe(11)
    expect(indexAtOffset(grid, 0)).toEqual([-3])
  })
})

describe('gridEntries', () => {
  it('walks storage order with logical indices', () => {
    expect(Array.from(gridEntries(sample()))).toEqual([
      [[0, 0], 0],
      [[1, 0], 1],
      [[-1, 0], 2],
      [[0, -1], 3],
      [[1, -1], 4],
      [[-1, -1], 5],
    ])
  })
})

describe('element magnitudes', () => {
  it('computes abs and abs2 on complex grids', () => {
    const grid = createMillerGrid(unit1(), complexField, [2], [
      complex(3, 4),
      complex(-1, 0),
    ])
    const abs = gridAbs(grid)
    const abs2 = gridAbs2(grid)
    expect(abs.data).toEqual([5, 1])
    expect(abs2.data).toEqual([25, 1])
    expect(abs2.field.kind).toBe('real')
    expect(abs2.basis).toBe(grid.basis)
    expect(abs2.bounds).toEqual(grid.bounds)
  })

  it('keeps the index mode through mapGrid', () => {
    const grid = createMillerGrid(unit1(), realField, [2], [1, 2], {
      indexMode: 'strict',
    })
    const doubled = mapGrid(grid, realField, (x) => x * 2)
    expect(doubled.data).toEqual([2, 4])
    expect(doubled.indexMode).toBe('strict')
  })
})

describe('grid comparison', () => {
  it('compares within the default relative tolerance', () => {
    const a = createMillerGrid(unit1(), realField, [2], [1, 2])
    const close = createMillerGrid(unit1(), realField, [2], [1, 2 + 1e-10])
    const far = createMillerGrid(unit1(), realField, [2], [1, 2.1])
    expect(gridsApproxEqual(a, close)).toBe(true)
    expect(gridsApproxEqual(a, far)).toBe(false)
  })

  it('uses only the absolute tolerance when one is given', () => {
    const a = createMillerGrid(unit1(), realField, [2], [1, 2])
    const b = createMillerGrid(unit1(), realField, [2], [1, 2.1])
    expect(gridsApproxEqual(a, b, { atol: 0.2 })).toBe(true)
    expect(gridsApproxEqual(a, b, { atol: 0.05 })).toBe(false)
  })

  it('requires identical bases and shapes', () => {
    const a = createMillerGrid(unit1(), realField, [2], [1, 2])
    const otherBasis = createMillerGrid(unit2x(), realField, [2], [1, 2])
    const otherShape = createMillerGrid(unit1(), realField, [3], [1, 2, 0])
    expect(() => gridsApproxEqual(a, otherBasis)).toThrow(ConsistencyError)
    expect(() => gridsApproxEqual(a, otherShape)).toThrow(
      'grids have different shapes',
    )
  })

  it('checks exact equality without throwing', () => {
    const a = createMillerGrid(unit1(), realField, [2], [1, 2])
    const same = createMillerGrid(unit1(), realField, [2], [1, 2])
    const scaled = createMillerGrid(unit2x(), realField, [2], [1, 2])
    expect(gridsEqual(a, same)).toBe(true)
    expect(gridsEqual(a, scaled)).toBe(false)
  })
})

describe('grid helpers', () => {
  it('fills zero grids', () => {
    const grid = zerosGrid(unit2(), complexField, [2, 2])
    expect(grid.data).toEqual([
      { re: 0, im: 0 },
      { re: 0, im: 0 },
      { re: 0, im: 0 },
      { re: 0, im: 0 },
    ])
  })

  it('sizes a grid from bounds', () => {
    const bounds = [
      { min: -2, max: 1 },
      { min: 0, max: 0 },
    ]
    const grid = gridFromBounds(unit2(), realField, bounds)
    expect(grid.size).toEqual([4, 1])
    expect(grid.bounds).toEqual(bounds)
    expect(grid.data).toEqual([0, 0, 0, 0])
  })

  it('divides the real-space cell volume by the element count', () => {
    // The real dual of the unit reciprocal basis is 2π·I.
    const grid = zerosGrid(unit2(), realField, [2, 2])
    expect(voxelSize(grid)).toBeCloseTo(Math.PI ** 2, 12)
  })
})
