import type {
  AggregateFunction,
  CellValue,
  DataFrame,
  FilterOperator,
  JoinHow,
  PivotFunction,
  SortDirection,
  TypeCategory,
} from '@/types'

/**
 * Dataframe engine contract
 *
 * Operations never touch rows directly; they describe what they want through
 * these calls. Every call resolves to a result, failures included, so callers
 * can attribute the error to the operation that asked for it.
 */

export type EngineErrorKind = 'TYPE_MISMATCH' | 'COLUMN_NOT_FOUND' | 'INVALID_OPERATOR' | 'ENGINE_INTERNAL'

export interface EngineError {
  kind: EngineErrorKind
  message: string
}

export type EngineResult = { ok: true; frame: DataFrame } | { ok: false; error: EngineError }

export type Condition =
  | { type: 'compare'; column: string; operator: FilterOperator; value?: CellValue }
  | { type: 'and'; conditions: Condition[] }
  | { type: 'or'; conditions: Condition[] }

export interface AggregationSpec {
  column: string
  fn: AggregateFunction
  alias: string
}

export interface PivotValueSpec {
  column: string
  fn: PivotFunction
}

export interface PivotSpec {
  index: string[]
  on: string[]
  values: PivotValueSpec[]
}

export interface JoinSpec {
  how: JoinHow
  leftOn?: string
  rightOn?: string
  suffix: string
}

export interface SortKey {
  column: string
  direction: SortDirection
}

export interface DataFrameEngine {
  filter(frame: DataFrame, condition: Condition): Promise<EngineResult>
  groupBy(frame: DataFrame, keys: string[], aggregations: AggregationSpec[]): Promise<EngineResult>
  pivot(frame: DataFrame, spec: PivotSpec): Promise<EngineResult>
  join(left: DataFrame, right: DataFrame, spec: JoinSpec): Promise<EngineResult>
  sort(frame: DataFrame, keys: SortKey[]): Promise<EngineResult>
  rename(frame: DataFrame, mapping: Record<string, string>): Promise<EngineResult>
  select(frame: DataFrame, columns: string[]): Promise<EngineResult>
  drop(frame: DataFrame, columns: string[]): Promise<EngineResult>
  cast(frame: DataFrame, column: string, to: TypeCategory): Promise<EngineResult>
  fillNull(frame: DataFrame, column: string, value: CellValue): Promise<EngineResult>
}

export function ok(frame: DataFrame): EngineResult {
  return { ok: true, frame }
}

export function fail(kind: EngineErrorKind, message: string): EngineResult {
  return { ok: false, error: { kind, message } }
}

export function columnNotFound(column: string): EngineError {
  return { kind: 'COLUMN_NOT_FOUND', message: `Column "${column}" not found` }
}
