import { asReciprocal } from '@kspace/lattice'
import type { LatticeBasis, ReciprocalBasis } from '@kspace/lattice'
import {
  ConsistencyError,
  ConstructionError,
  IndexRangeError,
} from '@kspace/shared'
import type { Complex, DiagnosticsOptions, MillerRange } from '@kspace/shared'

import { estimateFermi } from './fermi'
import type { MillerGrid } from './grid'
import { kpointCount } from './kpoints'
import type { KPointList } from './kpoints'
import { rangeLength } from './miller'

/** [spin][k 点][バンド] の入れ子配列。 */
export type Array3<T> = ReadonlyArray<ReadonlyArray<ReadonlyArray<T>>>

export type WavefunctionShape = readonly [
  nspin: number,
  nkpt: number,
  nband: number,
]

/** 平面波係数グリッドとバンドのエネルギー・占有数をまとめた波動関数。 */
export type ReciprocalWavefunction = {
  readonly lattice: ReciprocalBasis
  readonly kpoints: KPointList
  readonly waves: Array3<MillerGrid<Complex>>
  readonly energies: Array3<number>
  readonly occupancies: Array3<number>
  readonly shape: WavefunctionShape
}

export type WavefunctionInput = {
  lattice: LatticeBasis
  kpoints: KPointList
  waves: Array3<MillerGrid<Complex>>
  /** 省略時は全て 0。 */
  energies?: Array3<number>
  /** 省略時は全て 0。 */
  occupancies?: Array3<number>
}

const shapeOf = <T>(values: Array3<T>, label: string): WavefunctionShape => {
  const nspin = values.length
  const nkpt = nspin === 0 ? 0 : values[0].length
  const nband = nkpt === 0 ? 0 : values[0][0].length
  const rectangular = values.every(
    (spin) => spin.length === nkpt && spin.every((kpt) => kpt.length === nband),
  )
  if (!rectangular) {
    throw new ConsistencyError(`${label} array is not rectangular`)
  }
  return [nspin, nkpt, nband]
}

const sameShape = (a: WavefunctionShape, b: WavefunctionShape) =>
  a[0] === b[0] && a[1] === b[1] && a[2] === b[2]

const filled = (shape: WavefunctionShape, value: number): Array3<number> =>
  Array.from({ length: shape[0] }, () =>
    Array.from({ length: shape[1] }, () =>
      new Array<number>(shape[2]).fill(value),
    ),
  )

const freeze3 = <T>(values: Array3<T>): Array3<T> =>
  Object.freeze(
    values.map((spin) =>
      Object.freeze(spin.map((kpt) => Object.freeze([...kpt]))),
    ),
  )

export const createReciprocalWavefunction = (
  input: WavefunctionInput,
): ReciprocalWavefunction => {
  const lattice = asReciprocal(input.lattice)
  if (input.kpoints.dimension !== lattice.dimension) {
    throw new ConstructionError(
      'k-point dimension does not match the lattice',
      { lattice: lattice.dimension, kpoints: input.kpoints.dimension },
    )
  }
  const shape = shapeOf(input.waves, 'wavefunction')
  if (shape[1] !== kpointCount(input.kpoints)) {
    throw new ConsistencyError(
      'k-point list length inconsistent with number of wavefunction entries',
      { kpoints: kpointCount(input.kpoints), entries: shape[1] },
    )
  }
  const energies = input.energies ?? filled(shape, 0)
  const occupancies = input.occupancies ?? filled(shape, 0)
  if (!sameShape(shapeOf(energies, 'energy'), shape)) {
    throw new ConsistencyError(
      'energy array shape does not match the wavefunctions',
    )
  }
  if (!sameShape(shapeOf(occupancies, 'occupancy'), shape)) {
    throw new ConsistencyError(
      'occupancy array shape does not match the wavefunctions',
    )
  }
  const misplaced = input.waves.some((spin) =>
    spin.some((kpt) =>
      kpt.some((grid) => grid.size.length !== lattice.dimension),
    ),
  )
  if (misplaced) {
    throw new ConstructionError(
      'wavefunction grid dimension does not match the lattice',
    )
  }
  return Object.freeze({
    lattice,
    kpoints: input.kpoints,
    waves: freeze3(input.waves),
    energies: freeze3(energies),
    occupancies: freeze3(occupancies),
    shape: Object.freeze(shape),
  })
}

export const nspin = (wf: ReciprocalWavefunction) => wf.shape[0]
export const nkpt = (wf: ReciprocalWavefunction) => wf.shape[1]
export const nband = (wf: ReciprocalWavefunction) => wf.shape[2]

export type WavefunctionSample = {
  coefficients: MillerGrid<Complex>
  energy: number
  occupancy: number
}

export const wavefunctionAt = (
  wf: ReciprocalWavefunction,
  spin: number,
  kpt: number,
  band: number,
): WavefunctionSample => {
  const inRange = [spin, kpt, band].every(
    (value, axis) =>
      Number.isInteger(value) && value >= 0 && value < wf.shape[axis],
  )
  if (!inRange) {
    throw new IndexRangeError('wavefunction index is out of range', {
      index: [spin, kpt, band],
      shape: [...wf.shape],
    })
  }
  return {
    coefficients: wf.waves[spin][kpt][band],
    energy: wf.energies[spin][kpt][band],
    occupancy: wf.occupancies[spin][kpt][band],
  }
}

/**
 * 全グリッドを覆う Miller 指数範囲。
 *
 * 各軸 0..0 から始め、グリッドの範囲が現在の範囲以上の長さなら置き換える。
 */
export const wavefunctionBounds = (
  wf: ReciprocalWavefunction,
): Array<MillerRange> => {
  const bounds: Array<MillerRange> = Array.from(
    { length: wf.lattice.dimension },
    () => ({ min: 0, max: 0 }),
  )
  for (const spin of wf.waves) {
    for (const kpt of spin) {
      for (const grid of kpt) {
        grid.bounds.forEach((range, axis) => {
          if (rangeLength(range) >= rangeLength(bounds[axis])) {
            bounds[axis] = { ...range }
          }
        })
      }
    }
  }
  return bounds
}

/** 全スピン・k 点・バンドの占有数からフェルミ準位を推定する。 */
export const fermi = (
  wf: ReciprocalWavefunction,
  options?: DiagnosticsOptions,
): number =>
  estimateFermi(
    wf.energies.flatMap((spin, s) =>
      spin.flatMap((kpt, k) =>
        kpt.map((energy, b) => ({
          energy,
          occupancy: wf.occupancies[s][k][b],
        })),
      ),
    ),
    options,
  )
