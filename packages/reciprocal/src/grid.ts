import { asReal, asReciprocal, basesIdentical, volume } from '@kspace/lattice'
import type { LatticeBasis, ReciprocalBasis } from '@kspace/lattice'
import {
  ConsistencyError,
  ConstructionError,
  IndexRangeError,
} from '@kspace/shared'
import type { MillerIndex, MillerRange } from '@kspace/shared'

import { realField } from './field'
import type { ElementField } from './field'
import {
  centeredRange,
  elementCount,
  linearOffset,
  logicalIndex,
  rangeContains,
  rangeLength,
  unravelOffset,
  wrapIndex,
} from './miller'
import type { MillerBounds } from './miller'

/**
 * 範囲外指数の扱い。
 *
 * - `wrap`: 各軸 n を法として折り返す（既定）
 * - `strict`: 論理範囲外なら IndexRangeError
 */
export type IndexMode = 'wrap' | 'strict'

/**
 * 逆空間基底と結びついた密な Miller 指数グリッド。
 *
 * `data` は第 1 軸が最も速く変化する格納順の 1 次元配列で、
 * 論理指数 i は格納位置 `i mod n` に置かれる。
 */
export type MillerGrid<T> = {
  readonly kind: 'dense'
  readonly basis: ReciprocalBasis
  readonly field: ElementField<T>
  readonly size: ReadonlyArray<number>
  readonly bounds: MillerBounds
  readonly data: Array<T>
  readonly indexMode: IndexMode
}

export type MillerGridOptions = {
  /** 各軸の論理範囲。省略時は中心化された範囲。 */
  bounds?: MillerBounds
  indexMode?: IndexMode
}

export type ToleranceOptions = {
  rtol?: number
  atol?: number
}

const DEFAULT_RTOL = Math.sqrt(Number.EPSILON)

const requireSize = (size: ReadonlyArray<number>, dimension: number) => {
  if (size.length !== dimension) {
    throw new ConstructionError('grid dimension does not match the basis', {
      basisDimension: dimension,
      gridDimension: size.length,
    })
  }
  if (!size.every((n) => Number.isInteger(n) && n > 0)) {
    throw new ConstructionError('grid sizes must be positive integers', {
      size: [...size],
    })
  }
}

const resolveBounds = (
  size: ReadonlyArray<number>,
  bounds: MillerBounds | undefined,
): MillerBounds => {
  if (!bounds) {
    return Object.freeze(size.map((n) => Object.freeze(centeredRange(n))))
  }
  const consistent =
    bounds.length === size.length &&
    bounds.every(
      (range, axis) =>
        Number.isInteger(range.min) &&
        Number.isInteger(range.max) &&
        rangeLength(range) === size[axis],
    )
  if (!consistent) {
    throw new ConstructionError(
      'grid bounds must span exactly the grid size on every axis',
      { size: [...size], bounds: bounds.map((range) => ({ ...range })) },
    )
  }
  return Object.freeze(bounds.map((range) => Object.freeze({ ...range })))
}

/**
 * 基底・要素型・サイズ・格納順データからグリッドを生成する。
 *
 * 実空間基底を渡した場合は逆空間基底へ変換して保持する。データは複製する。
 */
export const createMillerGrid = <T>(
  basis: LatticeBasis,
  field: ElementField<T>,
  size: ReadonlyArray<number>,
  data: ReadonlyArray<T>,
  options?: MillerGridOptions,
): MillerGrid<T> => {
  requireSize(size, basis.dimension)
  const expected = elementCount(size)
  if (data.length !== expected) {
    throw new ConstructionError(
      'grid data length does not match the grid size',
      { expected, received: data.length },
    )
  }
  return Object.freeze({
    kind: 'dense',
    basis: asReciprocal(basis),
    field,
    size: Object.freeze([...size]),
    bounds: resolveBounds(size, options?.bounds),
    data: [...data],
    indexMode: options?.indexMode ?? 'wrap',
  })
}

/** 全要素が零のグリッド。 */
export const zerosGrid = <T>(
  basis: LatticeBasis,
  field: ElementField<T>,
  size: ReadonlyArray<number>,
  options?: MillerGridOptions,
): MillerGrid<T> => {
  requireSize(size, basis.dimension)
  const data = Array.from({ length: elementCount(size) }, () => field.zero())
  return createMillerGrid(basis, field, size, data, options)
}

/** 論理範囲から大きさを決めた零グリッド。 */
export const gridFromBounds = <T>(
  basis: LatticeBasis,
  field: ElementField<T>,
  bounds: MillerBounds,
  options?: Omit<MillerGridOptions, 'bounds'>,
): MillerGrid<T> =>
  zerosGrid(basis, field, bounds.map(rangeLength), { ...options, bounds })

/** Miller 指数に対応する格納位置（線形オフセット）。 */
export const storageOffset = <T>(
  grid: MillerGrid<T>,
  index: MillerIndex,
): number => {
  if (grid.indexMode === 'strict') {
    const outside =
      index.length !== grid.size.length ||
      grid.bounds.some((range, axis) => !rangeContains(range, index[axis]))
    if (outside) {
      throw new IndexRangeError('Miller index is outside the grid bounds', {
        index: [...index],
        bounds: grid.bounds.map((range) => ({ ...range })),
      })
    }
  }
  const offsets = grid.size.map((n, axis) => wrapIndex(index[axis], n))
  return linearOffset(offsets, grid.size)
}

export const gridGet = <T>(grid: MillerGrid<T>, index: MillerIndex): T =>
  grid.data[storageOffset(grid, index)]

export const gridSet = <T>(
  grid: MillerGrid<T>,
  index: MillerIndex,
  value: T,
): void => {
  grid.data[storageOffset(grid, index)] = value
}

/** 線形オフセットでの参照。オフセットは要素数を法として折り返す。 */
export const storageAt = <T>(grid: MillerGrid<T>, offset: number): T =>
  grid.data[wrapIndex(offset, grid.data.length)]

/** 格納位置 offset にある要素の論理 Miller 指数。 */
export const indexAtOffset = <T>(
  grid: MillerGrid<T>,
  offset: number,
): Array<number> =>
  unravelOffset(wrapIndex(offset, grid.data.length), grid.size).map(
    (o, axis) => logicalIndex(o, grid.bounds[axis]),
  )

/** 格納順に (論理指数, 値) を列挙する。 */
export function* gridEntries<T>(
  grid: MillerGrid<T>,
): Generator<[Array<number>, T]> {
  for (let offset = 0; offset < grid.data.length; offset += 1) {
    yield [indexAtOffset(grid, offset), grid.data[offset]]
  }
}

/** 各軸の格納範囲 0..n-1。 */
export const storageRanges = <T>(grid: MillerGrid<T>): Array<MillerRange> =>
  grid.size.map((n) => ({ min: 0, max: n - 1 }))

export const mapGrid = <T, U>(
  grid: MillerGrid<T>,
  field: ElementField<U>,
  fn: (value: T) => U,
): MillerGrid<U> =>
  createMillerGrid(grid.basis, field, grid.size, grid.data.map(fn), {
    bounds: grid.bounds,
    indexMode: grid.indexMode,
  })

/** 要素ごとの絶対値を同じ形状・基底の実数グリッドで返す。 */
export const gridAbs = <T>(grid: MillerGrid<T>): MillerGrid<number> =>
  mapGrid(grid, realField, grid.field.abs)

/** 要素ごとの |x|² を同じ形状・基底の実数グリッドで返す。 */
export const gridAbs2 = <T>(grid: MillerGrid<T>): MillerGrid<number> =>
  mapGrid(grid, realField, grid.field.abs2)

const sameShape = <T>(a: MillerGrid<T>, b: MillerGrid<T>) =>
  a.size.length === b.size.length &&
  a.size.every((n, axis) => n === b.size[axis]) &&
  a.bounds.every(
    (range, axis) =>
      range.min === b.bounds[axis].min && range.max === b.bounds[axis].max,
  )

const requireComparable = <T>(a: MillerGrid<T>, b: MillerGrid<T>) => {
  if (!basesIdentical(a.basis, b.basis)) {
    throw new ConsistencyError('grids have different reciprocal bases')
  }
  if (!sameShape(a, b)) {
    throw new ConsistencyError('grids have different shapes', {
      left: [...a.size],
      right: [...b.size],
    })
  }
}

const euclideanNorm = <T>(grid: MillerGrid<T>) =>
  Math.sqrt(grid.data.reduce((acc, value) => acc + grid.field.abs2(value), 0))

/**
 * 要素データの近似比較 ‖a - b‖ ≤ max(atol, rtol·max(‖a‖, ‖b‖))。
 *
 * 基底が厳密に同一でない、または形状が異なる場合は ConsistencyError。
 */
export const gridsApproxEqual = <T>(
  a: MillerGrid<T>,
  b: MillerGrid<T>,
  options?: ToleranceOptions,
): boolean => {
  requireComparable(a, b)
  const atol = options?.atol ?? 0
  const rtol = options?.rtol ?? (atol > 0 ? 0 : DEFAULT_RTOL)
  let diff2 = 0
  for (let i = 0; i < a.data.length; i += 1) {
    const d = a.field.distance(a.data[i], b.data[i])
    diff2 += d * d
  }
  const limit = Math.max(
    atol,
    rtol * Math.max(euclideanNorm(a), euclideanNorm(b)),
  )
  return Math.sqrt(diff2) <= limit
}

/** 基底・形状・全要素が厳密に一致するか。 */
export const gridsEqual = <T>(a: MillerGrid<T>, b: MillerGrid<T>): boolean =>
  basesIdentical(a.basis, b.basis) &&
  sameShape(a, b) &&
  a.data.every((value, i) => a.field.equals(value, b.data[i]))

/** 1 要素あたりの実空間体積。 */
export const voxelSize = <T>(grid: MillerGrid<T>): number =>
  volume(asReal(grid.basis)) / grid.data.length
