export type Vector3 = {
  x: number
  y: number
  z: number
}

/** 外部リーダーが渡す a/b/c ベクトル形式の格子。 */
export type Lattice = {
  a: Vector3
  b: Vector3
  c: Vector3
}

/** 格子定数（長さと角度、角度は度単位）。 */
export type LatticeParams = {
  a: number
  b: number
  c: number
  alpha: number
  beta: number
  gamma: number
}

export type Vector = ReadonlyArray<number>

/** 行優先の正方行列。基底ベクトルは列として格納する。 */
export type Matrix = ReadonlyArray<ReadonlyArray<number>>

/** 符号付き整数の Miller 指数。 */
export type MillerIndex = ReadonlyArray<number>

export type Complex = {
  re: number
  im: number
}

/** 1 軸分の Miller 指数範囲（両端を含む）。 */
export type MillerRange = {
  min: number
  max: number
}
