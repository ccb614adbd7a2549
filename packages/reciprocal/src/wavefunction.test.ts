import { realBasis, reciprocalBasis } from '@kspace/lattice'
import {
  ConsistencyError,
  ConstructionError,
  IndexRangeError,
  NumericAssumptionError,
  silentDiagnostics,
} from '@kspace/shared'
import { describe, expect, it } from 'vitest'

import { complexField } from './field'
import { zerosGrid } from './grid'
import { createKPointList } from './kpoints'
import {
  createReciprocalWavefunction,
  fermi,
  nband,
  nkpt,
  nspin,
  wavefunctionAt,
  wavefunctionBounds,
} from './wavefunction'

const lattice = reciprocalBasis([[1, 0], [0, 1]])
const wave = (n0: number, n1: number) =>
  zerosGrid(lattice, complexField, [n0, n1])
const quiet = { diagnostics: silentDiagnostics }

// one spin, two k-points, two bands
const build = () =>
  createReciprocalWavefunction({
    lattice,
    kpoints: createKPointList([
      [0, 0],
      [0.5, 0],
    ]),
    waves: [
      [
        [wave(3, 2), wave(3, 2)],
        [wave(5, 2), wave(2, 4)],
      ],
    ],
    energies: [
      [
        [-1, 2],
        [1, 3],
      ],
    ],
    occupancies: [
      [
        [1, 0],
        [1, 0],
      ],
    ],
  })

describe('createReciprocalWavefunction', () => {
  it('records the spin, k-point and band counts', () => {
    const wf = build()
    expect(nspin(wf)).toBe(1)
    expect(nkpt(wf)).toBe(2)
    expect(nband(wf)).toBe(2)
    expect(wf.lattice).toBe(lattice)
  })

  it('converts a real lattice to reciprocal space', () => {
    const wf = createReciprocalWavefunction({
      lattice: realBasis([[2 * Math.PI, 0], [0, 2 * Math.PI]]),
      kpoints: createKPointList([[0, 0]]),
      waves: [[[wave(1, 1)]]],
    })
    expect(wf.lattice.space).toBe('reciprocal')
    expect(wf.lattice.vectors[0][0]).toBeCloseTo(1, 12)
  })

  it('defaults energies and occupancies to zero', () => {
    const wf = createReciprocalWavefunction({
      lattice,
      kpoints: createKPointList([[0, 0]]),
      waves: [[[wave(1, 1), wave(1, 1)]], [[wave(1, 1), wave(1, 1)]]],
    })
    expect(wf.shape).toEqual([2, 1, 2])
    expect(wf.energies).toEqual([[[0, 0]], [[0, 0]]])
    expect(wf.occupancies).toEqual([[[0, 0]], [[0, 0]]])
  })

  it('requires one entry per k-point', () => {
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints: createKPointList([[0, 0]]),
        waves: [[[wave(1, 1)], [wave(1, 1)]]],
      }),
    ).toThrow(
      'k-point list length inconsistent with number of wavefunction entries',
    )
  })

  it('requires rectangular, matching arrays', () => {
    const kpoints = createKPointList([
      [0, 0],
      [0.5, 0],
    ])
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints,
        waves: [[[wave(1, 1), wave(1, 1)], [wave(1, 1)]]],
      }),
    ).toThrow(ConsistencyError)
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints,
        waves: [[[wave(1, 1)], [wave(1, 1)]]],
        energies: [[[0, 1], [0, 1]]],
      }),
    ).toThrow('energy array shape does not match the wavefunctions')
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints,
        waves: [[[wave(1, 1)], [wave(1, 1)]]],
        occupancies: [[[0]]],
      }),
    ).toThrow(ConsistencyError)
  })

  it('rejects k-points of another dimension', () => {
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints: createKPointList([[0, 0, 0]]),
        waves: [[[wave(1, 1)]]],
      }),
    ).toThrow(ConstructionError)
  })

  it('rejects grids of another dimension', () => {
    expect(() =>
      createReciprocalWavefunction({
        lattice,
        kpoints: createKPointList([[0, 0]]),
        waves: [[[zerosGrid(reciprocalBasis([[1]]), complexField, [1])]]],
      }),
    ).toThrow('wavefunction grid dimension does not match the lattice')
  })
})

describe('wavefunction access', () => {
  it('returns the coefficients with their energy and occupancy', () => {
    const wf = build()
    const sample = wavefunctionAt(wf, 0, 1, 1)
    expect(sample.coefficients.size).toEqual([2, 4])
    expect(sample.energy).toBe(3)
    expect(sample.occupancy).toBe(0)
    expect(() => wavefunctionAt(wf, 1, 0, 0)).toThrow(IndexRangeError)
    expect(() => wavefunctionAt(wf, 0, 0, 2)).toThrow(IndexRangeError)
  })

  it('keeps the longest range on each axis', () => {
    // axis 0: 3 → -1..1, 5 → -2..2, 2 → -1..0; axis 1: 2 → -1..0, 4 → -2..1
    expect(wavefunctionBounds(build())).toEqual([
      { min: -2, max: 2 },
      { min: -2, max: 1 },
    ])
  })
})

describe('fermi', () => {
  it('estimates across all spins, k-points and bands', () => {
    // sorted energies -1, 1, 2, 3 with occupancies 1, 1, 0, 0
    expect(fermi(build(), quiet)).toBe(1.5)
  })

  it('rejects all-zero occupancies', () => {
    const wf = createReciprocalWavefunction({
      lattice,
      kpoints: createKPointList([[0, 0]]),
      waves: [[[wave(1, 1)]]],
    })
    expect(() => fermi(wf, quiet)).toThrow(NumericAssumptionError)
  })
})
