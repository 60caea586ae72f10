export * from './engine'
export * from './frame'
export * from './type-category'
export * from './values'
export { requiresNumericInput, getReducerOutputType } from './aggregations'
export type { ReducerFunction } from './aggregations'
export { createDuckDBEngine } from './duckdb-engine'
export { planJoinColumns } from './join-plan'
export type { JoinColumnPlan } from './join-plan'
