/**
 * SQL Utility Functions
 *
 * Helpers for rendering DuckDB SQL in the exporter. Every identifier and
 * literal goes through quoting here.
 */

import type { CellValue } from '@/types'

/**
 * Escape a string for use in SQL (single quotes)
 */
export function escapeSqlString(value: string): string {
  return value.replace(/'/g, "''")
}

/**
 * Quote an identifier with double quotes (DuckDB identifier quoting)
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

export function toSqlValue(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return 'NULL'
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'NULL'
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE'
  }
  return `'${escapeSqlString(value)}'`
}

/**
 * Escape %, _ and backslash for use inside a LIKE pattern
 */
export function escapeLikePattern(pattern: string): string {
  return pattern.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_')
}

/**
 * Build a column list for SELECT statements
 */
export function buildColumnList(columns: string[], prefix?: string): string {
  return columns
    .map((col) => {
      const quoted = quoteIdentifier(col)
      return prefix ? `${prefix}.${quoted}` : quoted
    })
    .join(', ')
}
