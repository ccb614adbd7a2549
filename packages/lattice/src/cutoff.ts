import { InvalidArgumentError } from '@kspace/shared'

import { asReciprocal, isUnspecified } from './basis'
import type { LatticeBasis } from './basis'
import { angleCosines, generatePairs, lengths, volume } from './geometry'
import { determinant, dot } from './matrix'

/**
 * エネルギーカットオフ換算定数 c = 2m/ħ²（|G|² = c·E）。
 *
 * maxMillerIndex は既定値を持たないので、単位系に合わせて明示的に渡す。
 */
export const CUTOFF_CONSTANTS = {
  // VASP's value for eV and Å⁻¹
  vaspEvAngstrom: 0.262465831,
  // Hartree atomic units: E = |G|²/2
  hartreeBohr: 2,
} as const

// Pairwise sines, keyed by the ascending pair they belong to.
const pairSines = (basis: LatticeBasis) => {
  const pairs = generatePairs(basis.dimension).reverse()
  const cosines = angleCosines(basis)
  const sines = new Map<string, number>()
  pairs.forEach(([a, b], n) => {
    sines.set(`${a},${b}`, Math.sqrt(Math.max(0, 1 - cosines[n] * cosines[n])))
  })
  return sines
}

// Sine of the angle between vector i and the hyperplane spanned by the others.
const planeSine = (basis: LatticeBasis, i: number, length: number) => {
  if (basis.dimension === 1) {
    return 1
  }
  const others = basis.vectors.filter((_, j) => j !== i)
  const gram = others.map((u) => others.map((v) => dot(u, v)))
  const faceArea = Math.sqrt(Math.abs(determinant(gram)))
  return volume(basis) / (length * faceArea)
}

/**
 * 半径 √(c·E) の球内の逆格子ベクトルをすべて表せる、軸ごとの最大 Miller 指数。
 *
 * 各軸について、他軸とのセル角の正弦と、他の基底ベクトルが張る面との角の
 * 正弦のうち最小のものを使って上限を見積もる。実空間基底は逆空間へ変換する。
 */
export const maxMillerIndex = (
  basis: LatticeBasis,
  energyCutoff: number,
  constant: number,
): Array<number> => {
  if (!Number.isFinite(energyCutoff) || energyCutoff < 0) {
    throw new InvalidArgumentError(
      'energy cutoff must be a finite non-negative number',
      { energyCutoff },
    )
  }
  if (!Number.isFinite(constant) || constant <= 0) {
    throw new InvalidArgumentError(
      'cutoff constant must be a finite positive number',
      { constant },
    )
  }
  if (isUnspecified(basis)) {
    throw new InvalidArgumentError(
      'cannot size a Miller index range for an unspecified basis',
    )
  }
  const reciprocal = asReciprocal(basis)
  const radius = Math.sqrt(constant * energyCutoff)
  const vectorLengths = lengths(reciprocal)
  const sines = pairSines(reciprocal)
  return vectorLengths.map((length, i) => {
    const candidates = [planeSine(reciprocal, i, length)]
    for (let j = 0; j < reciprocal.dimension; j += 1) {
      if (j === i) continue
      const key = i < j ? `${i},${j}` : `${j},${i}`
      candidates.push(sines.get(key) ?? 1)
    }
    const minSine = Math.min(...candidates)
    return Math.floor(radius / (length * minSine) + 1)
  })
}
