import type { Complex } from '@kspace/shared'

/** グリッド要素型ごとの零元・比較・絶対値の定義。 */
export type ElementField<T> = {
  readonly kind: 'real' | 'complex'
  zero: () => T
  isZero: (value: T) => boolean
  equals: (a: T, b: T) => boolean
  abs: (value: T) => number
  abs2: (value: T) => number
  /** |a - b| */
  distance: (a: T, b: T) => number
}

export const complex = (re: number, im = 0): Complex => ({ re, im })

export const realField: ElementField<number> = {
  kind: 'real',
  zero: () => 0,
  isZero: (value) => value === 0,
  equals: (a, b) => a === b,
  abs: (value) => Math.abs(value),
  abs2: (value) => value * value,
  distance: (a, b) => Math.abs(a - b),
}

const complexAbs2 = (value: Complex) =>
  value.re * value.re + value.im * value.im

export const complexField: ElementField<Complex> = {
  kind: 'complex',
  zero: () => complex(0, 0),
  isZero: (value) => value.re === 0 && value.im === 0,
  equals: (a, b) => a.re === b.re && a.im === b.im,
  abs: (value) => Math.hypot(value.re, value.im),
  abs2: complexAbs2,
  distance: (a, b) => Math.hypot(a.re - b.re, a.im - b.im),
}
