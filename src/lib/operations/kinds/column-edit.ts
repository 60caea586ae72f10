/**
 * Column edit operation
 *
 * Schema-level edits: rename, drop, select, cast and fill nulls.
 */

import type { CellValue, ColumnInfo } from '@/types'
import { findColumn, getColumnTypeForCategory } from '@/lib/frame'
import { buildColumnList, quoteIdentifier, toSqlValue } from '@/lib/sql/sql'
import type { ColumnEditParams, OperationDefinition } from '../types'
import { columnCategory, issue, mapColumns, requireColumn, requireColumns } from '../validation'

function formatFillValue(value: CellValue): string {
  return typeof value === 'string' ? `"${value}"` : String(value)
}

export const columnEditOperation: OperationDefinition<ColumnEditParams> = {
  kind: 'column_edit',

  label(params) {
    switch (params.action) {
      case 'rename':
        return `Rename: ${params.column} → ${params.newName}`
      case 'drop':
        return `Drop columns: ${params.columns.join(', ')}`
      case 'select':
        return `Select columns: ${params.columns.join(', ')}`
      case 'cast':
        return `Cast: ${params.column} → ${params.to}`
      case 'fill_null':
        return `Fill nulls: ${params.column} with ${formatFillValue(params.value)}`
    }
  },

  validate(params, ctx) {
    switch (params.action) {
      case 'rename': {
        const issues = requireColumn(ctx, params.column, 'column')
        if (params.newName !== params.column && ctx.columns !== null && findColumn(ctx.columns, params.newName)) {
          issues.push(issue('COLUMN_EXISTS', `Column "${params.newName}" already exists`, 'newName'))
        }
        return issues
      }
      case 'drop': {
        const issues = requireColumns(ctx, params.columns, 'columns')
        if (ctx.columns !== null && issues.length === 0 && params.columns.length >= ctx.columns.length) {
          issues.push(issue('NO_COLUMNS_LEFT', 'Cannot drop every column', 'columns'))
        }
        return issues
      }
      case 'select':
        return requireColumns(ctx, params.columns, 'columns')
      case 'cast':
        return requireColumn(ctx, params.column, 'column')
      case 'fill_null': {
        const issues = requireColumn(ctx, params.column, 'column')
        const category = columnCategory(ctx, params.column)
        if (category === 'numeric' && typeof params.value === 'boolean') {
          issues.push(issue('TYPE_MISMATCH', `Cannot fill numeric column "${params.column}" with a boolean`, 'value'))
        }
        return issues
      }
    }
  },

  projectColumns: (params, ctx) =>
    mapColumns(ctx.columns, (columns): ColumnInfo[] => {
      switch (params.action) {
        case 'rename':
          return columns.map((c) => (c.name === params.column ? { ...c, name: params.newName } : c))
        case 'drop':
          return columns.filter((c) => !params.columns.includes(c.name))
        case 'select':
          return params.columns
            .map((name) => findColumn(columns, name))
            .filter((c): c is ColumnInfo => c !== undefined)
        case 'cast':
          return columns.map((c) => (c.name === params.column ? { ...c, type: getColumnTypeForCategory(params.to) } : c))
        case 'fill_null':
          return columns.map((c) => (c.name === params.column ? { ...c, nullable: false } : c))
      }
    }),

  apply(frame, params, ctx) {
    switch (params.action) {
      case 'rename':
        return ctx.engine.rename(frame, { [params.column]: params.newName })
      case 'drop':
        return ctx.engine.drop(frame, params.columns)
      case 'select':
        return ctx.engine.select(frame, params.columns)
      case 'cast':
        return ctx.engine.cast(frame, params.column, params.to)
      case 'fill_null':
        return ctx.engine.fillNull(frame, params.column, params.value)
    }
  },

  toSql(params, ctx) {
    const column = 'column' in params ? quoteIdentifier(params.column) : ''
    switch (params.action) {
      case 'rename':
        return `SELECT * RENAME (${column} AS ${quoteIdentifier(params.newName)}) FROM ${ctx.source}`
      case 'drop':
        return `SELECT * EXCLUDE (${buildColumnList(params.columns)}) FROM ${ctx.source}`
      case 'select':
        return `SELECT ${buildColumnList(params.columns)} FROM ${ctx.source}`
      case 'cast':
        return `SELECT * REPLACE (CAST(${column} AS ${getColumnTypeForCategory(params.to)}) AS ${column}) FROM ${ctx.source}`
      case 'fill_null':
        return `SELECT * REPLACE (COALESCE(${column}, ${toSqlValue(params.value)}) AS ${column}) FROM ${ctx.source}`
    }
  },
}
