import {
  ConsistencyError,
  ConstructionError,
  IndexRangeError,
} from '@kspace/shared'
import type { DiagnosticsOptions } from '@kspace/shared'

import { estimateFermi } from './fermi'
import { kpointAt, kpointCount } from './kpoints'
import type { KPoint, KPointList } from './kpoints'

/** 1 つの k 点におけるバンドのエネルギーと占有数。 */
export type BandAtKPoint = {
  readonly energies: ReadonlyArray<number>
  readonly occupancies: ReadonlyArray<number>
}

export type BandStructure = {
  readonly kpoints: KPointList
  readonly bands: ReadonlyArray<BandAtKPoint>
}

export const createBandAtKPoint = (
  energies: ReadonlyArray<number>,
  occupancies?: ReadonlyArray<number>,
): BandAtKPoint => {
  const occ = occupancies ?? energies.map(() => 0)
  if (occ.length !== energies.length) {
    throw new ConstructionError('energy and occupancy lists differ in length', {
      energies: energies.length,
      occupancies: occ.length,
    })
  }
  return Object.freeze({
    energies: Object.freeze([...energies]),
    occupancies: Object.freeze([...occ]),
  })
}

export const bandCount = (band: BandAtKPoint) => band.energies.length

/** n 番目のバンドの [エネルギー, 占有数]。 */
export const bandPair = (band: BandAtKPoint, n: number): [number, number] => {
  if (!Number.isInteger(n) || n < 0 || n >= band.energies.length) {
    throw new IndexRangeError('band index is out of range', {
      index: n,
      count: band.energies.length,
    })
  }
  return [band.energies[n], band.occupancies[n]]
}

export const createBandStructure = (
  kpoints: KPointList,
  bands: ReadonlyArray<BandAtKPoint>,
): BandStructure => {
  if (bands.length !== kpointCount(kpoints)) {
    throw new ConsistencyError(
      'number of k-points and band sets do not match',
      { kpoints: kpointCount(kpoints), bands: bands.length },
    )
  }
  const counts = bands.map(bandCount)
  if (counts.some((n) => n !== counts[0])) {
    throw new ConsistencyError('band counts differ between k-points', {
      counts,
    })
  }
  return Object.freeze({ kpoints, bands: Object.freeze([...bands]) })
}

export const bandStructureNkpt = (bs: BandStructure) => bs.bands.length

export const bandStructureNband = (bs: BandStructure) =>
  bs.bands.length === 0 ? 0 : bandCount(bs.bands[0])

export type BandSample = {
  kpoint: KPoint
  energy: number
  occupancy: number
}

export const bandStructureAt = (
  bs: BandStructure,
  k: number,
  n: number,
): BandSample => {
  const kpoint = kpointAt(bs.kpoints, k)
  const band = bs.bands[k < 0 ? bs.bands.length + k : k]
  const [energy, occupancy] = bandPair(band, n)
  return { kpoint, energy, occupancy }
}

export const bandStructureFermi = (
  bs: BandStructure,
  options?: DiagnosticsOptions,
): number =>
  estimateFermi(
    bs.bands.flatMap((band) =>
      band.energies.map((energy, i) => ({
        energy,
        occupancy: band.occupancies[i],
      })),
    ),
    options,
  )
