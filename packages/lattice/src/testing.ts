import { expect } from 'vitest'
import type { Matrix } from '@kspace/shared'

/** 行列の各成分を toBeCloseTo で比較する。 */
export const expectMatrixClose = (
  actual: Matrix,
  expected: Matrix,
  digits = 9,
) => {
  expect(actual).toHaveLength(expected.length)
  expected.forEach((row, i) => {
    expect(actual[i]).toHaveLength(row.length)
    row.forEach((value, j) => {
      expect(actual[i][j]).toBeCloseTo(value, digits)
    })
  })
}
