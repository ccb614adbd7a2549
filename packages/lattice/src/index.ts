export * from './matrix'
export * from './basis'
export * from './geometry'
export * from './triangularize'
export * from './cutoff'
export * from './params'
