/**
 * Operation Types
 *
 * Core type definitions for recorded dataset operations:
 * - Kind-specific params (see params.ts)
 * - Lifecycle states
 * - The per-kind definition contract (label, validation, schema projection,
 *   engine calls, SQL rendering)
 */

import type { ColumnInfo, DataFrame, DatasetHandle } from '@/types'
import type { DataFrameEngine, EngineResult } from '@/lib/frame'
import type {
  AggregateParams,
  ColumnEditParams,
  FilterParams,
  JoinParams,
  PivotParams,
  SearchParams,
  SortParams,
} from './params'

export type {
  AggregateParams,
  ColumnEditParams,
  FilterParams,
  JoinParams,
  OperationSpecInput,
  PivotParams,
  SearchParams,
  SortParams,
} from './params'

// ===== OPERATION KINDS =====

export interface OperationParamsMap {
  filter: FilterParams
  search: SearchParams
  aggregate: AggregateParams
  pivot: PivotParams
  join: JoinParams
  sort: SortParams
  column_edit: ColumnEditParams
}

export type OperationKind = keyof OperationParamsMap

/**
 * Kind + params pair. Indexed over K so that definition lookups stay
 * correlated with their params.
 */
export type OperationSpec<K extends OperationKind = OperationKind> = {
  [P in K]: { kind: P; params: OperationParamsMap[P] }
}[K]

// ===== STATE =====

export type OperationState = 'queued' | 'executed' | 'failed' | 'undone'

// ===== VALIDATION =====

export interface ValidationIssue {
  code: string
  message: string
  field?: string
}

export interface ValidationContext {
  /** Columns the operation will see; null when they depend on data (after a pivot) */
  columns: ColumnInfo[] | null
  resolveDataset: (datasetId: string) => DatasetHandle | undefined
}

// ===== EXECUTION =====

export interface OperationContext {
  engine: DataFrameEngine
  resolveDataset: (datasetId: string) => DatasetHandle | undefined
}

export interface SqlContext {
  /** Relation the step reads from (previous CTE or base table) */
  source: string
  columns: ColumnInfo[] | null
  resolveTableName: (datasetId: string) => string
  resolveDataset: (datasetId: string) => DatasetHandle | undefined
}

// ===== DEFINITION =====

export interface OperationDefinition<TParams> {
  readonly kind: OperationKind

  /** Display label, e.g. "Filter: Age > 30" */
  label(params: TParams): string

  /** Semantic checks against the projected columns. Structural checks happen in params.ts. */
  validate(params: TParams, ctx: ValidationContext): ValidationIssue[]

  /** Columns after this operation, or null when they cannot be known without data */
  projectColumns(params: TParams, ctx: ValidationContext): ColumnInfo[] | null

  apply(frame: DataFrame, params: TParams, ctx: OperationContext): Promise<EngineResult>

  /** SELECT statement reproducing this step over `ctx.source` */
  toSql(params: TParams, ctx: SqlContext): string
}

export type OperationDefinitionMap = {
  [K in OperationKind]: OperationDefinition<OperationParamsMap[K]>
}
