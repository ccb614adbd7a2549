import type { MillerIndex } from '@kspace/shared'

import { gridEntries, gridGet, gridSet } from './grid'
import type { MillerGrid } from './grid'
import type { MillerBounds } from './miller'
import {
  densify,
  sparseBounds,
  sparseEntries,
  sparseGet,
  sparseSet,
  sparsify,
} from './sparse'
import type { SparseMillerMap } from './sparse'

/** 密・疎どちらの Miller 指数データも受け付ける共通の型。 */
export type HklData<T> = MillerGrid<T> | SparseMillerMap<T>

export const hklGet = <T>(data: HklData<T>, index: MillerIndex): T => {
  switch (data.kind) {
    case 'dense':
      return gridGet(data, index)
    case 'sparse':
      return sparseGet(data, index)
  }
}

export const hklSet = <T>(
  data: HklData<T>,
  index: MillerIndex,
  value: T,
): void => {
  switch (data.kind) {
    case 'dense':
      gridSet(data, index, value)
      return
    case 'sparse':
      sparseSet(data, index, value)
      return
  }
}

/** 密なら全要素、疎なら格納要素を (論理指数, 値) で列挙する。 */
export const hklEntries = <T>(
  data: HklData<T>,
): Iterable<[ReadonlyArray<number>, T]> =>
  data.kind === 'dense' ? gridEntries(data) : sparseEntries(data)

/** 密なら各軸の論理範囲、疎なら格納指数を覆う範囲（空なら null）。 */
export const hklBounds = <T>(data: HklData<T>): MillerBounds | null =>
  data.kind === 'dense' ? data.bounds : sparseBounds(data)

export const hklDimension = <T>(data: HklData<T>): number =>
  data.basis.dimension

export const toDense = <T>(data: HklData<T>): MillerGrid<T> =>
  data.kind === 'dense' ? data : densify(data)

export const toSparse = <T>(data: HklData<T>): SparseMillerMap<T> =>
  data.kind === 'sparse' ? data : sparsify(data)
