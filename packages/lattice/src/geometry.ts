import { ConstructionError, ConsistencyError } from '@kspace/shared'
import type { MillerIndex, Vector } from '@kspace/shared'

import {
  asReciprocal,
  basisMatrix,
  dual,
  isUnspecified,
  replaceMatrix,
} from './basis'
import type { LatticeBasis, LatticeBasisOf, Space } from './basis'
import {
  TAU,
  determinant,
  dot,
  invert,
  multiply,
  multiplyMatVec,
  norm,
  scale,
  transpose,
} from './matrix'

/** 各基底ベクトル（列）の長さ。 */
export const lengths = (basis: LatticeBasis): Array<number> =>
  basis.vectors.map((v) => norm(v))

/** セル体積 |det|。左手系でも符号は付かない。 */
export const volume = (basis: LatticeBasis): number =>
  Math.abs(determinant(basisMatrix(basis)))

/** 0..D-1 の昇順ペアを生成する。 */
export const generatePairs = (dimension: number): Array<[number, number]> => {
  const pairs: Array<[number, number]> = []
  for (let a = 0; a < dimension; a += 1) {
    for (let b = a + 1; b < dimension; b += 1) {
      pairs.push([a, b])
    }
  }
  return pairs
}

/**
 * セル角の余弦。ペア順を逆にすることで 3 次元では [α, β, γ] の順になる。
 */
export const angleCosines = (basis: LatticeBasis): Array<number> =>
  generatePairs(basis.dimension)
    .reverse()
    .map(([a, b]) => {
      const va = basis.vectors[a]
      const vb = basis.vectors[b]
      return dot(va, vb) / (norm(va) * norm(vb))
    })

export const anglesRad = (basis: LatticeBasis): Array<number> =>
  angleCosines(basis).map((c) => Math.acos(c))

export const anglesDeg = (basis: LatticeBasis): Array<number> =>
  anglesRad(basis).map((angle) => (angle * 180) / Math.PI)

/** Gram 行列 bᵀb（基底ベクトル同士の内積）。 */
export const gramMatrix = (basis: LatticeBasis): Array<Array<number>> => {
  const m = basisMatrix(basis)
  return multiply(transpose(m), m)
}

const requireDimension = (basis: LatticeBasis, v: Vector, label: string) => {
  if (v.length !== basis.dimension) {
    throw new ConsistencyError(`${label} dimension does not match the basis`, {
      expected: basis.dimension,
      received: v.length,
    })
  }
}

/** 分率座標を直交座標へ変換する。 */
export const toCartesian = (basis: LatticeBasis, fractional: Vector) => {
  requireDimension(basis, fractional, 'fractional coordinate')
  return multiplyMatVec(basisMatrix(basis), fractional)
}

/** 直交座標を分率座標へ変換する。 */
export const toFractional = (basis: LatticeBasis, cartesian: Vector) => {
  requireDimension(basis, cartesian, 'cartesian coordinate')
  const inverse = invert(basisMatrix(basis))
  if (!inverse) {
    throw new ConsistencyError(
      'cannot convert coordinates with an unspecified basis',
    )
  }
  return multiplyMatVec(inverse, cartesian)
}

/** Miller 指数で指定した格子面の面間隔 2π/|G|（G は逆格子ベクトル）。 */
export const dSpacing = (basis: LatticeBasis, miller: MillerIndex): number => {
  requireDimension(basis, miller, 'Miller index')
  const reciprocal = asReciprocal(basis)
  const g = multiplyMatVec(basisMatrix(reciprocal), miller)
  return TAU / norm(g)
}

/** 基底ベクトルを一様に拡大縮小する。 */
export const scaleBasis = <S extends Space>(
  basis: LatticeBasisOf<S>,
  factor: number,
): LatticeBasisOf<S> => {
  if (!Number.isFinite(factor) || (factor === 0 && !isUnspecified(basis))) {
    throw new ConstructionError('scale factor must be finite and nonzero', {
      factor,
    })
  }
  return replaceMatrix(basis, scale(basisMatrix(basis), factor))
}

/** 双対基底との積 dual(b)ᵀ·b（常に 2π·I になる）。 */
export const dualityProduct = (basis: LatticeBasis): Array<Array<number>> =>
  multiply(transpose(basisMatrix(dual(basis))), basisMatrix(basis))
