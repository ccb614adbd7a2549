import type { Matrix, Vector } from '@kspace/shared'

export const TAU = 2 * Math.PI

/** |det| がこの値と列ノルム積の積を下回る行列を特異とみなす。 */
export const SINGULAR_TOLERANCE = 1.0e-12

type MutableMatrix = Array<Array<number>>

const copyMatrix = (m: Matrix): MutableMatrix => m.map((row) => [...row])

export const isSquare = (m: Matrix): boolean =>
  m.length > 0 && m.every((row) => row.length === m.length)

export const isZeroMatrix = (m: Matrix): boolean =>
  m.every((row) => row.every((value) => value === 0))

export const identity = (n: number): MutableMatrix =>
  Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)),
  )

export const zeros = (rows: number, cols = rows): MutableMatrix =>
  Array.from({ length: rows }, () => new Array<number>(cols).fill(0))

export const transpose = (m: Matrix): MutableMatrix => {
  const rows = m.length
  const cols = rows === 0 ? 0 : m[0].length
  return Array.from({ length: cols }, (_, j) =>
    Array.from({ length: rows }, (_, i) => m[i][j]),
  )
}

export const scale = (m: Matrix, factor: number): MutableMatrix =>
  m.map((row) => row.map((value) => value * factor))

export const multiply = (a: Matrix, b: Matrix): MutableMatrix => {
  const inner = b.length
  const cols = inner === 0 ? 0 : b[0].length
  return a.map((row) => {
    const out = new Array<number>(cols).fill(0)
    for (let k = 0; k < inner; k += 1) {
      const aik = row[k]
      if (aik === 0) continue
      for (let j = 0; j < cols; j += 1) {
        out[j] += aik * b[k][j]
      }
    }
    return out
  })
}

export const multiplyMatVec = (m: Matrix, v: Vector): Array<number> =>
  m.map((row) => row.reduce((acc, value, j) => acc + value * v[j], 0))

export const column = (m: Matrix, j: number): Array<number> =>
  m.map((row) => row[j])

export const dot = (a: Vector, b: Vector): number =>
  a.reduce((acc, value, i) => acc + value * b[i], 0)

export const norm = (v: Vector): number => Math.sqrt(dot(v, v))

export const maxAbsDifference = (a: Matrix, b: Matrix) => {
  let max = 0
  for (let i = 0; i < a.length; i += 1) {
    for (let j = 0; j < a[i].length; j += 1) {
      const diff = Math.abs(a[i][j] - b[i][j])
      if (diff > max) {
        max = diff
      }
    }
  }
  return max
}

/** LU 分解（部分ピボット）で行列式を求める。 */
export const determinant = (m: Matrix): number => {
  const n = m.length
  const lu = copyMatrix(m)
  let det = 1
  for (let k = 0; k < n; k += 1) {
    let pivot = k
    for (let i = k + 1; i < n; i += 1) {
      if (Math.abs(lu[i][k]) > Math.abs(lu[pivot][k])) {
        pivot = i
      }
    }
    if (lu[pivot][k] === 0) {
      return 0
    }
    if (pivot !== k) {
      const swap = lu[k]
      lu[k] = lu[pivot]
      lu[pivot] = swap
      det = -det
    }
    det *= lu[k][k]
    for (let i = k + 1; i < n; i += 1) {
      const factor = lu[i][k] / lu[k][k]
      if (factor === 0) continue
      for (let j = k; j < n; j += 1) {
        lu[i][j] -= factor * lu[k][j]
      }
    }
  }
  return det
}

const columnNormProduct = (m: Matrix) => {
  let product = 1
  for (let j = 0; j < m.length; j += 1) {
    product *= norm(column(m, j))
  }
  return product
}

/** 列ノルムで規格化した行列式が許容値以下なら特異とみなす。 */
export const isSingular = (m: Matrix, det = determinant(m)): boolean => {
  const scaleFactor = columnNormProduct(m)
  return scaleFactor === 0 || Math.abs(det) <= SINGULAR_TOLERANCE * scaleFactor
}

/** Gauss-Jordan 消去で逆行列を求める。特異なら null。 */
export const invert = (m: Matrix): MutableMatrix | null => {
  if (isSingular(m)) {
    return null
  }
  const n = m.length
  const a = copyMatrix(m)
  const inv = identity(n)
  for (let k = 0; k < n; k += 1) {
    let pivot = k
    for (let i = k + 1; i < n; i += 1) {
      if (Math.abs(a[i][k]) > Math.abs(a[pivot][k])) {
        pivot = i
      }
    }
    if (a[pivot][k] === 0) {
      return null
    }
    if (pivot !== k) {
      const swapA = a[k]
      a[k] = a[pivot]
      a[pivot] = swapA
      const swapInv = inv[k]
      inv[k] = inv[pivot]
      inv[pivot] = swapInv
    }
    const diag = a[k][k]
    for (let j = 0; j < n; j += 1) {
      a[k][j] /= diag
      inv[k][j] /= diag
    }
    for (let i = 0; i < n; i += 1) {
      if (i === k) continue
      const factor = a[i][k]
      if (factor === 0) continue
      for (let j = 0; j < n; j += 1) {
        a[i][j] -= factor * a[k][j]
        inv[i][j] -= factor * inv[k][j]
      }
    }
  }
  return inv
}

export type QrDecomposition = {
  q: MutableMatrix
  r: MutableMatrix
}

/** Householder 変換による QR 分解（m = q·r）。 */
export const qrDecompose = (m: Matrix): QrDecomposition => {
  const n = m.length
  const r = copyMatrix(m)
  const q = identity(n)
  for (let k = 0; k < n - 1; k += 1) {
    let sumSquares = 0
    for (let i = k; i < n; i += 1) {
      sumSquares += r[i][k] * r[i][k]
    }
    const columnNorm = Math.sqrt(sumSquares)
    if (columnNorm === 0) continue
    const alpha = r[k][k] > 0 ? -columnNorm : columnNorm
    const v = new Array<number>(n).fill(0)
    v[k] = r[k][k] - alpha
    for (let i = k + 1; i < n; i += 1) {
      v[i] = r[i][k]
    }
    const vNorm2 = dot(v, v)
    if (vNorm2 === 0) continue
    for (let j = 0; j < n; j += 1) {
      let s = 0
      for (let i = k; i < n; i += 1) {
        s += v[i] * r[i][j]
      }
      const f = (2 * s) / vNorm2
      for (let i = k; i < n; i += 1) {
        r[i][j] -= f * v[i]
      }
    }
    for (let i = 0; i < n; i += 1) {
      let s = 0
      for (let j = k; j < n; j += 1) {
        s += q[i][j] * v[j]
      }
      const f = (2 * s) / vNorm2
      for (let j = k; j < n; j += 1) {
        q[i][j] -= f * v[j]
      }
    }
    for (let i = k + 1; i < n; i += 1) {
      r[i][k] = 0
    }
  }
  return { q, r }
}

/** 各成分を最近接整数との差へ折り返し、[-0.5, 0.5) に収める。 */
export const wrapFractional = (v: Vector): Array<number> =>
  v.map((value) => value - Math.round(value))
