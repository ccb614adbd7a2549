import { NumericAssumptionError, resolveDiagnostics } from '@kspace/shared'
import type { DiagnosticsOptions } from '@kspace/shared'

export type OccupiedState = {
  energy: number
  occupancy: number
}

/**
 * 占有数が最大値の半分をまたぐ位置からフェルミ準位を推定する。
 *
 * 最大占有数は 1（スピン分極）か 2（非分極）でなければならない。
 * 半分ちょうどの状態があればそのエネルギーを返し、なければ境界を挟む
 * 2 状態のエネルギーを占有数の差の逆数で重み付け平均する。
 */
export const estimateFermi = (
  states: ReadonlyArray<OccupiedState>,
  options?: DiagnosticsOptions,
): number => {
  if (states.length === 0) {
    throw new NumericAssumptionError(
      'no states to estimate the Fermi energy from',
    )
  }
  const maxOccupancy = Math.round(
    states.reduce((max, s) => Math.max(max, s.occupancy), -Infinity),
  )
  if (maxOccupancy !== 1 && maxOccupancy !== 2) {
    throw new NumericAssumptionError(
      `The calculated maximum occupancy was ${maxOccupancy}`,
      { maxOccupancy },
    )
  }
  const half = maxOccupancy / 2
  const sorted = [...states].sort((a, b) => a.energy - b.energy)
  let crossing = -1
  for (let i = sorted.length - 1; i >= 0; i -= 1) {
    if (sorted[i].occupancy > half) {
      crossing = i
      break
    }
  }
  if (crossing < 0 || crossing === sorted.length - 1) {
    throw new NumericAssumptionError('occupancies do not cross half filling', {
      maxOccupancy,
      crossing,
    })
  }
  resolveDiagnostics(options, 'fermi').debug('occupancy crossing', {
    index: crossing,
  })
  const below = sorted[crossing]
  const above = sorted[crossing + 1]
  if (above.occupancy === half) {
    return above.energy
  }
  const wBelow = 1 / Math.abs(half - below.occupancy)
  const wAbove = 1 / Math.abs(half - above.occupancy)
  const total = wBelow + wAbove
  return (below.energy * wBelow + above.energy * wAbove) / total
}
