import type { CellValue, ColumnInfo, DataFrame, FrameSource, LazyFrame, Row, Schema } from '@/types'
import { PREVIEW_PAGE_SIZE } from '@/lib/constants'
import { getTypeCategory } from './type-category'

export function createFrame(columns: ColumnInfo[], rows: readonly Readonly<Row>[]): DataFrame {
  return { columns, rows }
}

export function isLazyFrame(source: FrameSource): source is LazyFrame {
  return 'lazy' in source && source.lazy
}

/**
 * Wrap a deferred scan. Columns must be known without reading rows.
 */
export function createLazyFrame(columns: ColumnInfo[], scan: () => Promise<DataFrame>): LazyFrame {
  return {
    lazy: true,
    columns,
    collect: scan,
  }
}

/**
 * Resolve a source to a materialized frame
 */
export async function collectFrame(source: FrameSource): Promise<DataFrame> {
  if (isLazyFrame(source)) {
    return source.collect()
  }
  return source
}

export function getSchema(columns: ColumnInfo[]): Schema {
  const schema: Schema = {}
  for (const column of columns) {
    schema[column.name] = getTypeCategory(column.type)
  }
  return schema
}

export function findColumn(columns: ColumnInfo[], name: string): ColumnInfo | undefined {
  return columns.find((c) => c.name === name)
}

export function getColumnValues(frame: DataFrame, name: string): CellValue[] {
  return frame.rows.map((row) => row[name] ?? null)
}

export interface FramePage {
  rows: readonly Readonly<Row>[]
  page: number
  pageSize: number
  totalRows: number
  totalPages: number
}

/**
 * Slice a frame for display. Pages are zero-based; out-of-range pages are empty.
 */
export function getPage(frame: DataFrame, page: number, pageSize = PREVIEW_PAGE_SIZE): FramePage {
  const totalRows = frame.rows.length
  const start = page * pageSize
  return {
    rows: frame.rows.slice(start, start + pageSize),
    page,
    pageSize,
    totalRows,
    totalPages: Math.ceil(totalRows / pageSize),
  }
}
