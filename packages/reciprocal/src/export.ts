import { basisMatrix } from '@kspace/lattice'
import type { MillerRange } from '@kspace/shared'

import type { MillerGrid } from './grid'
import { toDense } from './hkl'
import type { HklData } from './hkl'
import { elementCount, linearOffset, unravelOffset } from './miller'

/** 書き出し用の格納順 1 次元データ。 */
export type GridSamples<T> = {
  size: Array<number>
  values: Array<T>
}

/**
 * 周期的な書き出し用に各軸 n+1 点へ広げたビュー。
 *
 * 最後の 1 点は各軸の先頭要素を繰り返す。
 */
export const wrappedView = <T>(grid: MillerGrid<T>): GridSamples<T> => {
  const size = grid.size.map((n) => n + 1)
  const values = Array.from({ length: elementCount(size) }, (_, linear) => {
    const offsets = unravelOffset(linear, size).map(
      (p, axis) => p % grid.size[axis],
    )
    return grid.data[linearOffset(offsets, grid.size)]
  })
  return { size, values }
}

export type ExportPayload<T> = {
  lattice: Array<Array<number>>
  bounds: Array<MillerRange>
  samples: GridSamples<T>
}

/**
 * 外部ファイル形式へ渡すための格子行列・範囲・サンプル列。
 *
 * 疎なデータは先に密なグリッドへ展開する。`periodic` が false なら
 * 折り返し点を含めない。
 */
export const exportPayload = <T>(
  data: HklData<T>,
  options?: { periodic?: boolean },
): ExportPayload<T> => {
  const grid = toDense(data)
  const periodic = options?.periodic ?? true
  return {
    lattice: basisMatrix(grid.basis),
    bounds: grid.bounds.map((range) => ({ ...range })),
    samples: periodic
      ? wrappedView(grid)
      : { size: [...grid.size], values: [...grid.data] },
  }
}
