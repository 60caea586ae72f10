import type { ColumnInfo, TypeCategory } from '@/types'
import { findColumn, getTypeCategory } from '@/lib/frame'
import type { ValidationContext, ValidationIssue } from './types'

export function issue(code: string, message: string, field?: string): ValidationIssue {
  return field === undefined ? { code, message } : { code, message, field }
}

/**
 * Column existence check. Skipped when the projected columns are unknown;
 * the engine reports COLUMN_NOT_FOUND at execution instead.
 */
export function requireColumn(ctx: ValidationContext, column: string, field: string): ValidationIssue[] {
  if (ctx.columns === null || findColumn(ctx.columns, column)) {
    return []
  }
  return [issue('NO_COLUMN', `Column "${column}" does not exist`, field)]
}

export function requireColumns(ctx: ValidationContext, columns: string[], field: string): ValidationIssue[] {
  return columns.flatMap((column) => requireColumn(ctx, column, field))
}

/**
 * Category of a column in the projected schema, null when unknown
 */
export function columnCategory(ctx: ValidationContext, column: string): TypeCategory | null {
  if (ctx.columns === null) return null
  const info = findColumn(ctx.columns, column)
  return info ? getTypeCategory(info.type) : null
}

export function mapColumns(columns: ColumnInfo[] | null, fn: (columns: ColumnInfo[]) => ColumnInfo[]): ColumnInfo[] | null {
  return columns === null ? null : fn(columns)
}
