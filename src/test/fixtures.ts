/**
 * Test fixtures shared across suites
 */

import type { CellValue, ColumnInfo, DataFrame, DatasetHandle, Row } from '@/types'
import { createFrame, type EngineResult } from '@/lib/frame'

export function column(name: string, type: string, nullable = true): ColumnInfo {
  return { name, type, nullable }
}

export function frameOf(columns: ColumnInfo[], rows: Row[]): DataFrame {
  return createFrame(columns, rows)
}

/** Name, Age, Fare, City: three passengers */
export function passengers(): DataFrame {
  return frameOf(
    [column('Name', 'VARCHAR'), column('Age', 'BIGINT'), column('Fare', 'DOUBLE'), column('City', 'VARCHAR')],
    [
      { Name: 'Ann', Age: 25, Fare: 7.25, City: 'Oslo' },
      { Name: 'Bob', Age: 40, Fare: 71.5, City: 'Rome' },
      { Name: 'Cy', Age: 31, Fare: 8.05, City: 'Oslo' },
    ]
  )
}

/** City -> Country lookup for joins */
export function cities(): DataFrame {
  return frameOf(
    [column('City', 'VARCHAR'), column('Country', 'VARCHAR')],
    [
      { City: 'Oslo', Country: 'Norway' },
      { City: 'Rome', Country: 'Italy' },
      { City: 'Lima', Country: 'Peru' },
    ]
  )
}

export function handleOf(id: string, frame: DataFrame, name = id): DatasetHandle {
  return { id, name, columns: frame.columns, collect: async () => frame }
}

export function unwrap(result: EngineResult): DataFrame {
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`)
  }
  return result.frame
}

export function values(frame: DataFrame | null, name: string): CellValue[] {
  return frame ? frame.rows.map((row) => row[name] ?? null) : []
}

export function names(frame: DataFrame | null): string[] {
  return frame ? frame.columns.map((c) => c.name) : []
}
