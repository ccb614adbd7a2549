import { ConstructionError } from '@kspace/shared'
import type { DiagnosticsOptions, Lattice, LatticeParams } from '@kspace/shared'

import { realBasis } from './basis'
import type { RealBasis } from './basis'

// Exact values at multiples of 90° so orthogonal cells carry no round-off.
const cosDeg = (deg: number) => {
  const turns = (((deg % 360) + 360) % 360) / 90
  if (Number.isInteger(turns)) {
    return [1, 0, -1, 0][turns]
  }
  return Math.cos((deg * Math.PI) / 180)
}

const sinDeg = (deg: number) => cosDeg(90 - deg)

const requirePositive = (label: string, value: number) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConstructionError(`${label} must be a positive finite number`, {
      [label]: value,
    })
  }
}

const requireAngle = (label: string, value: number) => {
  if (!Number.isFinite(value) || value <= 0 || value >= 180) {
    throw new ConstructionError(
      `${label} must lie strictly between 0 and 180 degrees`,
      { [label]: value },
    )
  }
}

/** 2 次元セルを長さと角度（度）から生成する。b ベクトルは y 方向。 */
export const basisFromParameters2D = (
  a: number,
  b: number,
  gamma: number,
  options?: DiagnosticsOptions,
): RealBasis => {
  requirePositive('a', a)
  requirePositive('b', b)
  requireAngle('gamma', gamma)
  return realBasis(
    [
      [a * sinDeg(gamma), 0],
      [a * cosDeg(gamma), b],
    ],
    options,
  )
}

/**
 * 3 次元セルを格子定数から生成する。
 *
 * b ベクトルを y 方向、a ベクトルを z に垂直に取り、c ベクトルは自由に向く。
 */
export const basisFromParameters3D = (
  params: LatticeParams,
  options?: DiagnosticsOptions,
): RealBasis => {
  const { a, b, c, alpha, beta, gamma } = params
  requirePositive('a', a)
  requirePositive('b', b)
  requirePositive('c', c)
  requireAngle('alpha', alpha)
  requireAngle('beta', beta)
  requireAngle('gamma', gamma)
  const c1 =
    (c * (cosDeg(beta) - cosDeg(gamma) * cosDeg(alpha))) / sinDeg(gamma)
  const c2 = c * cosDeg(alpha)
  const radicand = c * c - (c1 * c1 + c2 * c2)
  if (radicand <= 0) {
    throw new ConstructionError('cell angles do not describe a valid cell', {
      alpha,
      beta,
      gamma,
    })
  }
  return realBasis(
    [
      [a * sinDeg(gamma), 0, c1],
      [a * cosDeg(gamma), b, c2],
      [0, 0, Math.sqrt(radicand)],
    ],
    options,
  )
}

/** a/b/c ベクトル形式の格子を実空間基底（列が a, b, c）へ変換する。 */
export const basisFromVectors = (
  lattice: Lattice,
  options?: DiagnosticsOptions,
): RealBasis =>
  realBasis(
    [
      [lattice.a.x, lattice.b.x, lattice.c.x],
      [lattice.a.y, lattice.b.y, lattice.c.y],
      [lattice.a.z, lattice.b.z, lattice.c.z],
    ],
    options,
  )
