export * from './field'
export * from './miller'
export * from './grid'
export * from './sparse'
export * from './hkl'
export * from './kpoints'
export * from './bands'
export * from './fermi'
export * from './wavefunction'
export * from './export'
