import { ConstructionError, resolveDiagnostics } from '@kspace/shared'
import type { DiagnosticsOptions, Matrix, Vector } from '@kspace/shared'

import {
  TAU,
  determinant,
  invert,
  isSingular,
  isSquare,
  isZeroMatrix,
  scale,
  transpose,
  zeros,
} from './matrix'

export type Space = 'real' | 'reciprocal'

/** 空間タグ付きの基底。基底ベクトルは列ごとに保持する。 */
export type LatticeBasisOf<S extends Space> = {
  readonly space: S
  readonly dimension: number
  readonly vectors: ReadonlyArray<Vector>
}

/** 実空間の基底（長さの単位は呼び出し側の規約に従う）。 */
export type RealBasis = LatticeBasisOf<'real'>

/** 逆空間の基底（rad/長さ）。 */
export type ReciprocalBasis = LatticeBasisOf<'reciprocal'>

export type LatticeBasis = RealBasis | ReciprocalBasis

const freezeColumns = (m: Matrix): ReadonlyArray<Vector> =>
  Object.freeze(
    Array.from({ length: m.length }, (_, j) =>
      Object.freeze(m.map((row) => row[j])),
    ),
  )

// Skips the sanity check; callers pass matrices derived from a validated basis.
const fromTrustedMatrix = <S extends Space>(
  space: S,
  m: Matrix,
): LatticeBasisOf<S> =>
  Object.freeze({
    space,
    dimension: m.length,
    vectors: freezeColumns(m),
  })

/**
 * 基底行列の妥当性を検査する。
 *
 * 全要素 0 の行列は「未指定の基底」として受け入れる。それ以外で特異なら
 * ConstructionError、行列式が負（左手系）なら警告のみ出す。
 */
export const checkBasisMatrix = (
  m: Matrix,
  options?: DiagnosticsOptions,
): void => {
  if (!isSquare(m)) {
    throw new ConstructionError('basis matrix must be square and non-empty', {
      rows: m.length,
      columns: m.map((row) => row.length),
    })
  }
  if (m.some((row) => row.some((value) => !Number.isFinite(value)))) {
    throw new ConstructionError('basis matrix contains non-finite values')
  }
  if (isZeroMatrix(m)) {
    return
  }
  const det = determinant(m)
  if (isSingular(m, det)) {
    throw new ConstructionError('cell vectors are not linearly independent', {
      matrix: m,
    })
  }
  if (det < 0) {
    resolveDiagnostics(options, 'lattice').warn(
      'cell vectors form a left-handed coordinate system',
      { determinant: det },
    )
  }
}

/** 行列（列が基底ベクトル）から検査済みの基底を生成する。 */
export const createBasis = <S extends Space>(
  space: S,
  m: Matrix,
  options?: DiagnosticsOptions,
): LatticeBasisOf<S> => {
  checkBasisMatrix(m, options)
  return fromTrustedMatrix(space, m)
}

export const realBasis = (m: Matrix, options?: DiagnosticsOptions): RealBasis =>
  createBasis('real', m, options)

export const reciprocalBasis = (
  m: Matrix,
  options?: DiagnosticsOptions,
): ReciprocalBasis => createBasis('reciprocal', m, options)

/** 列ベクトルの並びから基底を生成する。 */
export const basisFromColumns = <S extends Space>(
  space: S,
  vectors: ReadonlyArray<Vector>,
  options?: DiagnosticsOptions,
): LatticeBasisOf<S> => createBasis(space, transpose(vectors), options)

/** 未指定を表す全要素 0 の基底。 */
export const zeroBasis = <S extends Space>(
  space: S,
  dimension: number,
): LatticeBasisOf<S> => fromTrustedMatrix(space, zeros(dimension))

export const isUnspecified = (basis: LatticeBasisOf<Space>): boolean =>
  basis.vectors.every((v) => v.every((value) => value === 0))

/** 保持している列ベクトルから正方行列を組み立て直す。 */
export const basisMatrix = (basis: LatticeBasisOf<Space>): Array<Array<number>> =>
  transpose(basis.vectors)

// The zero sentinel has no dual; it converts to the zero sentinel of the
// other space.
const dualMatrix = (basis: LatticeBasis): Matrix | null => {
  if (isUnspecified(basis)) {
    return null
  }
  return invert(basisMatrix(basis))
}

/** 実空間基底を 2π·(Mᵀ)⁻¹ で逆空間基底へ変換する。 */
export const toReciprocal = (basis: RealBasis): ReciprocalBasis => {
  const inverse = dualMatrix(basis)
  if (!inverse) {
    return zeroBasis('reciprocal', basis.dimension)
  }
  return fromTrustedMatrix('reciprocal', transpose(scale(inverse, TAU)))
}

/** 逆空間基底を (2π·M⁻¹)ᵀ で実空間基底へ変換する。 */
export const toReal = (basis: ReciprocalBasis): RealBasis => {
  const inverse = dualMatrix(basis)
  if (!inverse) {
    return zeroBasis('real', basis.dimension)
  }
  return fromTrustedMatrix('real', transpose(scale(inverse, TAU)))
}

/** 逆空間の基底を返す。すでに逆空間ならそのまま返す。 */
export const asReciprocal = (basis: LatticeBasis): ReciprocalBasis =>
  basis.space === 'reciprocal' ? basis : toReciprocal(basis)

/** 実空間の基底を返す。すでに実空間ならそのまま返す。 */
export const asReal = (basis: LatticeBasis): RealBasis =>
  basis.space === 'real' ? basis : toReal(basis)

/**
 * 双対格子。列ベクトル基底に対して dual(b)ᵀ·b == 2π·I を満たす。
 *
 * 単純な逆行列による双対（2π なし）とは異なる点に注意。
 */
export function dual(basis: RealBasis): ReciprocalBasis
export function dual(basis: ReciprocalBasis): RealBasis
export function dual(basis: LatticeBasis): LatticeBasis
export function dual(basis: LatticeBasis): LatticeBasis {
  return basis.space === 'real' ? toReciprocal(basis) : toReal(basis)
}

/** 同じ空間・同じ成分の基底かどうか（厳密比較）。 */
export const basesIdentical = (a: LatticeBasis, b: LatticeBasis): boolean =>
  a === b ||
  (a.space === b.space &&
    a.dimension === b.dimension &&
    a.vectors.every((v, j) => v.every((value, i) => value === b.vectors[j][i])))

export const replaceMatrix = <S extends Space>(
  basis: LatticeBasisOf<S>,
  m: Matrix,
): LatticeBasisOf<S> => fromTrustedMatrix(basis.space, m)
