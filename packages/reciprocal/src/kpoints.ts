import { determinant, invert, isSquare, wrapFractional } from '@kspace/lattice'
import { ConstructionError, IndexRangeError } from '@kspace/shared'
import type { Matrix, Vector } from '@kspace/shared'

export type KPoint = {
  readonly point: Vector
  readonly weight: number
}

/** 重み付き k 点の並び。重みは合計 1 に規格化済み。 */
export type KPointList = {
  readonly kind: 'list'
  readonly dimension: number
  readonly points: ReadonlyArray<Vector>
  readonly weights: ReadonlyArray<number>
}

/** 生成行列とシフトで表した k 点メッシュ。 */
export type KPointGrid = {
  readonly kind: 'grid'
  readonly dimension: number
  readonly generator: Matrix
  readonly shift: Vector
}

export type KPoints = KPointList | KPointGrid

export type KPointListOptions = {
  /** 宣言する次元。省略時は先頭の点から決める。 */
  dimension?: number
}

/**
 * k 点リストを生成する。重みを省略すると全点 1 とみなし、合計で規格化する。
 */
export const createKPointList = (
  points: ReadonlyArray<Vector>,
  weights?: ReadonlyArray<number>,
  options?: KPointListOptions,
): KPointList => {
  if (points.length === 0) {
    throw new ConstructionError('k-point list must not be empty')
  }
  const dimension = options?.dimension ?? points[0].length
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new ConstructionError(
      'k-point dimension must be a positive integer',
      { dimension },
    )
  }
  points.forEach((point, i) => {
    if (point.length !== dimension || !point.every(Number.isFinite)) {
      throw new ConstructionError(
        'k-points must be finite vectors of one dimension',
        { index: i, expected: dimension, received: point.length },
      )
    }
  })
  const raw = weights ?? points.map(() => 1)
  if (raw.length !== points.length) {
    throw new ConstructionError(
      'number of k-points and weights do not match',
      { points: points.length, weights: raw.length },
    )
  }
  if (raw.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new ConstructionError(
      'k-point weights must be finite and non-negative',
      { weights: [...raw] },
    )
  }
  const total = raw.reduce((acc, w) => acc + w, 0)
  if (!(total > 0) || !Number.isFinite(total)) {
    throw new ConstructionError('k-point weights must have a positive sum', {
      total,
    })
  }
  return Object.freeze({
    kind: 'list',
    dimension,
    points: Object.freeze(points.map((point) => Object.freeze([...point]))),
    weights: Object.freeze(raw.map((w) => w / total)),
  })
}

export const kpointCount = (list: KPointList) => list.points.length

/** i 番目の k 点。負の値は末尾から数える。 */
export const kpointAt = (list: KPointList, index: number): KPoint => {
  const n = list.points.length
  const i = index < 0 ? n + index : index
  if (!Number.isInteger(i) || i < 0 || i >= n) {
    throw new IndexRangeError('k-point index is out of range', {
      index,
      count: n,
    })
  }
  return { point: list.points[i], weight: list.weights[i] }
}

export const kpointEntries = (list: KPointList): Array<KPoint> =>
  list.points.map((point, i) => ({ point, weight: list.weights[i] }))

/** Array.prototype.slice と同じ範囲指定。重みは再規格化しない。 */
export const sliceKPoints = (
  list: KPointList,
  start?: number,
  end?: number,
): Array<KPoint> => kpointEntries(list).slice(start, end)

export const kpointsEqual = (a: KPoint, b: KPoint): boolean =>
  a.weight === b.weight &&
  a.point.length === b.point.length &&
  a.point.every((value, i) => value === b.point[i])

export const kpointListsEqual = (a: KPointList, b: KPointList): boolean =>
  a.points.length === b.points.length &&
  a.points.every((_, i) => kpointsEqual(kpointAt(a, i), kpointAt(b, i)))

/**
 * k 点メッシュを生成する。生成行列は非負整数の正方行列、シフトは
 * [-0.5, 0.5) に折り返して保持する。
 */
export const createKPointGrid = (
  generator: Matrix,
  shift?: Vector,
): KPointGrid => {
  if (!isSquare(generator)) {
    throw new ConstructionError(
      'k-point grid generator must be a square matrix',
    )
  }
  if (generator.some((row) => row.some((value) => !Number.isInteger(value)))) {
    throw new ConstructionError('k-point grid generator must contain integers')
  }
  if (generator.some((row) => row.some((value) => value < 0))) {
    throw new ConstructionError(
      'negative values are disallowed in the grid matrix',
    )
  }
  const dimension = generator.length
  const rawShift = shift ?? new Array<number>(dimension).fill(0)
  if (rawShift.length !== dimension || !rawShift.every(Number.isFinite)) {
    throw new ConstructionError(
      'k-point grid shift does not match the grid dimension',
      { expected: dimension, received: rawShift.length },
    )
  }
  return Object.freeze({
    kind: 'grid',
    dimension,
    generator: Object.freeze(generator.map((row) => Object.freeze([...row]))),
    shift: Object.freeze(wrapFractional(rawShift)),
  })
}

/** メッシュ点の数 |det(generator)|。 */
export const kpointGridSize = (grid: KPointGrid): number =>
  Math.round(Math.abs(determinant(grid.generator)))

const KEY_RESOLUTION = 1e9

// [0, 1) に折り返し、丸め誤差で 1 に張り付いた値は 0 にそろえる
const wrapUnit = (value: number) => {
  const wrapped = value - Math.floor(value)
  return Math.round(wrapped * KEY_RESOLUTION) === KEY_RESOLUTION ? 0 : wrapped
}

const pointKey = (point: Vector) =>
  point.map((value) => Math.round(value * KEY_RESOLUTION)).join(',')

const compareVectors = (a: Vector, b: Vector) => {
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return 0
}

/**
 * メッシュを k 点リストへ展開する。
 *
 * 点は (m + shift)ᵀ·generator⁻¹ を [-0.5, 0.5) に折り返したもので、
 * 重みはすべて等しい。
 */
export const expandKPointGrid = (grid: KPointGrid): KPointList => {
  const inverse = invert(grid.generator)
  if (!inverse) {
    throw new ConstructionError('k-point grid generator is singular')
  }
  const origin = new Array<number>(grid.dimension).fill(0)
  const seen = new Map<string, Array<number>>([[pointKey(origin), origin]])
  const queue: Array<Array<number>> = [origin]
  while (queue.length > 0) {
    const current = queue.shift()
    if (!current) break
    for (const step of inverse) {
      const next = current.map((value, i) => wrapUnit(value + step[i]))
      const key = pointKey(next)
      if (!seen.has(key)) {
        seen.set(key, next)
        queue.push(next)
      }
    }
  }
  const offset = grid.shift.map((_, j) =>
    grid.shift.reduce((acc, s, i) => acc + s * inverse[i][j], 0),
  )
  const points = Array.from(seen.values(), (point) =>
    wrapFractional(point.map((value, i) => value + offset[i])),
  ).sort(compareVectors)
  return createKPointList(points)
}
