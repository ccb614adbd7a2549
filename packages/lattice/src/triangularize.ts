import {
  ConstructionError,
  SingularTransformError,
  resolveDiagnostics,
} from '@kspace/shared'
import type { DiagnosticsOptions, Matrix } from '@kspace/shared'

import { basisMatrix, isUnspecified, replaceMatrix } from './basis'
import type { LatticeBasisOf, Space } from './basis'
import { determinant, isSquare, multiply, qrDecompose } from './matrix'

// Flipping rows of R (Q -> Q·S) keeps every cell vector length and angle.
const positiveDiagonal = (r: Matrix): Array<Array<number>> =>
  r.map((row, i) => {
    const sign = row[i] < 0 ? -1 : 1
    return row.map((value) => (value === 0 ? 0 : value * sign))
  })

const upperTriangular = (m: Matrix) => positiveDiagonal(qrDecompose(m).r)

/**
 * QR 分解で基底を上三角形式へ変換する。対角成分は常に正。
 *
 * LAMMPS などが要求する右手系の標準セルになる。
 */
export const triangularize = <S extends Space>(
  basis: LatticeBasisOf<S>,
): LatticeBasisOf<S> => {
  if (isUnspecified(basis)) {
    return basis
  }
  return replaceMatrix(basis, upperTriangular(basisMatrix(basis)))
}

const requireIntegerTransform = (transform: Matrix, dimension: number) => {
  if (!isSquare(transform) || transform.length !== dimension) {
    throw new ConstructionError(
      'supercell transform must be a square D×D matrix',
      { dimension, rows: transform.length },
    )
  }
  if (transform.some((row) => row.some((value) => !Number.isInteger(value)))) {
    throw new ConstructionError(
      'supercell transform must contain integers only',
    )
  }
}

/**
 * 整数変換行列でスーパーセルへ拡張した後に上三角化する。
 *
 * 行列式 0 の変換は SingularTransformError。負の行列式は結果が常に右手系へ
 * 揃えられるため警告のみ。
 */
export const triangularizeSupercell = <S extends Space>(
  basis: LatticeBasisOf<S>,
  transform: Matrix,
  options?: DiagnosticsOptions,
): LatticeBasisOf<S> => {
  requireIntegerTransform(transform, basis.dimension)
  const det = determinant(transform)
  if (det === 0) {
    throw new SingularTransformError('supercell transform matrix is singular', {
      transform,
    })
  }
  if (det < 0) {
    resolveDiagnostics(options, 'lattice').warn(
      'supercell transform has a negative determinant; ' +
        'the result is right-handed',
      { determinant: det },
    )
  }
  if (isUnspecified(basis)) {
    return basis
  }
  const supercell = multiply(basisMatrix(basis), transform)
  return replaceMatrix(basis, upperTriangular(supercell))
}
