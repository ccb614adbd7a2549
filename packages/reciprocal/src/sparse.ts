import { asReciprocal, basesIdentical, zeroBasis } from '@kspace/lattice'
import type { LatticeBasis, ReciprocalBasis } from '@kspace/lattice'
import { ConsistencyError, ConstructionError } from '@kspace/shared'
import type { MillerIndex } from '@kspace/shared'

import type { ElementField } from './field'
import { gridEntries, gridFromBounds, gridSet } from './grid'
import type { IndexMode, MillerGrid } from './grid'
import {
  boundingRanges,
  millerKey,
  rangeContains,
  requireMillerIndex,
} from './miller'
import type { MillerBounds } from './miller'

type SparseEntry<T> = {
  readonly index: ReadonlyArray<number>
  readonly value: T
}

/**
 * 零でない値を持つ指数だけを保持する疎な Miller 指数マップ。
 *
 * 零元を書き込むとその指数は削除される。
 */
export type SparseMillerMap<T> = {
  readonly kind: 'sparse'
  readonly basis: ReciprocalBasis
  readonly field: ElementField<T>
  readonly dimension: number
  readonly entries: Map<string, SparseEntry<T>>
}

export type SparseMapOptions = {
  /** 省略時は零（未指定）の逆空間基底。 */
  basis?: LatticeBasis
}

export const createSparseMap = <T>(
  field: ElementField<T>,
  dimension: number,
  entries: Iterable<readonly [MillerIndex, T]> = [],
  options?: SparseMapOptions,
): SparseMillerMap<T> => {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new ConstructionError('map dimension must be a positive integer', {
      dimension,
    })
  }
  const basis = options?.basis
    ? asReciprocal(options.basis)
    : zeroBasis('reciprocal', dimension)
  if (basis.dimension !== dimension) {
    throw new ConstructionError('map dimension does not match the basis', {
      basisDimension: basis.dimension,
      mapDimension: dimension,
    })
  }
  const map: SparseMillerMap<T> = Object.freeze({
    kind: 'sparse',
    basis,
    field,
    dimension,
    entries: new Map<string, SparseEntry<T>>(),
  })
  for (const [index, value] of entries) {
    requireMillerIndex(index, map.dimension)
    sparseSet(map, index, value)
  }
  return map
}

/** 格納されていない指数は零元を返す。 */
export const sparseGet = <T>(
  map: SparseMillerMap<T>,
  index: MillerIndex,
): T => {
  const entry = map.entries.get(millerKey(index))
  return entry ? entry.value : map.field.zero()
}

/** 値を書き込む。零元なら指数ごと削除する。 */
export const sparseSet = <T>(
  map: SparseMillerMap<T>,
  index: MillerIndex,
  value: T,
): void => {
  const key = millerKey(index)
  if (map.field.isZero(value)) {
    map.entries.delete(key)
    return
  }
  map.entries.set(key, { index: Object.freeze([...index]), value })
}

export const sparseHas = <T>(map: SparseMillerMap<T>, index: MillerIndex) =>
  map.entries.has(millerKey(index))

export const sparseKeys = <T>(
  map: SparseMillerMap<T>,
): Array<ReadonlyArray<number>> =>
  Array.from(map.entries.values(), (entry) => entry.index)

export const sparseSize = <T>(map: SparseMillerMap<T>) => map.entries.size

export function* sparseEntries<T>(
  map: SparseMillerMap<T>,
): Generator<[ReadonlyArray<number>, T]> {
  for (const entry of map.entries.values()) {
    yield [entry.index, entry.value]
  }
}

/** 格納されている指数を覆う最小範囲。空なら null。 */
export const sparseBounds = <T>(
  map: SparseMillerMap<T>,
): MillerBounds | null => boundingRanges(sparseKeys(map), map.dimension)

export type DensifyOptions = {
  /** 展開先の論理範囲。省略時は格納指数を覆う最小範囲。 */
  bounds?: MillerBounds
  indexMode?: IndexMode
}

/**
 * 密なグリッドへ展開する。
 *
 * 値は格納位置 `k mod n` に置かれ、それ以外は零元になる。
 * 範囲を省略した空のマップは全軸 0..0 の零グリッドになる。
 */
export const densify = <T>(
  map: SparseMillerMap<T>,
  options?: DensifyOptions,
): MillerGrid<T> => {
  const covering = sparseBounds(map)
  const bounds =
    options?.bounds ??
    covering ??
    Array.from({ length: map.dimension }, () => ({ min: 0, max: 0 }))
  const uncovered = sparseKeys(map).find(
    (index) =>
      !bounds.every((range, axis) => rangeContains(range, index[axis])),
  )
  if (uncovered) {
    throw new ConsistencyError(
      'stored Miller index lies outside the requested bounds',
      { index: [...uncovered] },
    )
  }
  const grid = gridFromBounds(map.basis, map.field, bounds, {
    indexMode: options?.indexMode,
  })
  for (const entry of map.entries.values()) {
    gridSet(grid, entry.index, entry.value)
  }
  return grid
}

/** 零でない要素だけを論理指数で格納したマップへ変換する。 */
export const sparsify = <T>(grid: MillerGrid<T>): SparseMillerMap<T> => {
  const map: SparseMillerMap<T> = createSparseMap(
    grid.field,
    grid.size.length,
    [],
    { basis: grid.basis },
  )
  for (const [index, value] of gridEntries(grid)) {
    sparseSet(map, index, value)
  }
  return map
}

/** 基底（厳密）・次元・格納指数と値が一致するか。 */
export const sparseMapsEqual = <T>(
  a: SparseMillerMap<T>,
  b: SparseMillerMap<T>,
): boolean => {
  if (a.dimension !== b.dimension || a.entries.size !== b.entries.size) {
    return false
  }
  if (!basesIdentical(a.basis, b.basis)) {
    return false
  }
  for (const [key, entry] of a.entries) {
    const other = b.entries.get(key)
    if (!other || !a.field.equals(entry.value, other.value)) {
      return false
    }
  }
  return true
}
