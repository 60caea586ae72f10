export type CellValue = string | number | boolean | null

export type Row = Record<string, CellValue>

export interface ColumnInfo {
  name: string
  type: string
  nullable: boolean
}

/**
 * A fully materialized frame. Rows are plain records keyed by column name;
 * `columns` carries order and declared types. Frames share row objects with
 * the frames they were derived from, so rows are never written in place.
 */
export interface DataFrame {
  readonly columns: ColumnInfo[]
  readonly rows: readonly Readonly<Row>[]
}

/**
 * A lazily scanned source. Columns are known up front, rows only after collect().
 */
export interface LazyFrame {
  readonly lazy: true
  readonly columns: ColumnInfo[]
  collect(): Promise<DataFrame>
}

export type FrameSource = DataFrame | LazyFrame

export type TypeCategory = 'numeric' | 'text' | 'date' | 'boolean' | 'unknown'

/** Column name -> type category, in column order */
export type Schema = Record<string, TypeCategory>

export type ExecutionMode = 'lazy' | 'eager'

export type FilterOperator =
  | 'eq'
  | 'neq'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'contains'
  | 'not_contains'
  | 'starts_with'
  | 'ends_with'
  | 'is_true'
  | 'is_false'
  | 'is_null'
  | 'is_not_null'

export type SortDirection = 'asc' | 'desc'

export type AggregateFunction = 'sum' | 'mean' | 'count' | 'min' | 'max' | 'median' | 'std'

export type PivotFunction = 'sum' | 'mean' | 'count' | 'min' | 'max' | 'first' | 'last' | 'len'

export type JoinHow = 'inner' | 'left' | 'outer' | 'cross' | 'semi' | 'anti'

/**
 * Read-only view of another loaded dataset, used to resolve the right side of joins.
 */
export interface DatasetHandle {
  id: string
  name: string
  columns: ColumnInfo[]
  collect(): Promise<DataFrame>
}
