import { ConstructionError } from '@kspace/shared'
import type { MillerIndex, MillerRange } from '@kspace/shared'

export type MillerBounds = ReadonlyArray<MillerRange>

/**
 * サイズ n の軸の中心化された論理範囲 [-⌊n/2⌋, n - ⌊n/2⌋ - 1]。
 *
 * 例: n = 8 なら -4..3、n = 5 なら -2..2。
 */
export const centeredRange = (size: number): MillerRange => {
  const half = Math.floor(size / 2)
  return { min: -half, max: size - half - 1 }
}

export const rangeLength = (range: MillerRange) => range.max - range.min + 1

export const rangeContains = (range: MillerRange, value: number) =>
  value >= range.min && value <= range.max

export const wrapIndex = (value: number, size: number) =>
  ((value % size) + size) % size

/** 格納位置 offset に対応する、範囲内の論理 Miller 指数。 */
export const logicalIndex = (offset: number, range: MillerRange) =>
  range.min + wrapIndex(offset - range.min, rangeLength(range))

/** 第 1 軸が最も速く変化する順序での線形オフセット。 */
export const linearOffset = (
  offsets: ReadonlyArray<number>,
  sizes: ReadonlyArray<number>,
) => {
  let linear = 0
  for (let axis = sizes.length - 1; axis >= 0; axis -= 1) {
    linear = linear * sizes[axis] + offsets[axis]
  }
  return linear
}

export const unravelOffset = (linear: number, sizes: ReadonlyArray<number>) => {
  const offsets = new Array<number>(sizes.length)
  let rest = linear
  for (let axis = 0; axis < sizes.length; axis += 1) {
    offsets[axis] = rest % sizes[axis]
    rest = Math.floor(rest / sizes[axis])
  }
  return offsets
}

export const elementCount = (sizes: ReadonlyArray<number>) =>
  sizes.reduce((acc, n) => acc * n, 1)

export const millerKey = (index: MillerIndex) => index.join(',')

export const isMillerIndex = (value: MillerIndex, dimension: number) =>
  value.length === dimension && value.every((i) => Number.isInteger(i))

export const requireMillerIndex = (value: MillerIndex, dimension: number) => {
  if (!isMillerIndex(value, dimension)) {
    throw new ConstructionError(
      'Miller index must be an integer tuple of the grid dimension',
      { index: value, dimension },
    )
  }
}

/** 指数集合を覆う軸ごとの最小範囲。空なら null。 */
export const boundingRanges = (
  indices: Iterable<MillerIndex>,
  dimension: number,
): Array<MillerRange> | null => {
  let ranges: Array<MillerRange> | null = null
  for (const index of indices) {
    if (!ranges) {
      ranges = Array.from({ length: dimension }, (_, axis) => ({
        min: index[axis],
        max: index[axis],
      }))
      continue
    }
    for (let axis = 0; axis < dimension; axis += 1) {
      const range = ranges[axis]
      if (index[axis] < range.min) range.min = index[axis]
      if (index[axis] > range.max) range.max = index[axis]
    }
  }
  return ranges
}
