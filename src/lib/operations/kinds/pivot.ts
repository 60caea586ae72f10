/**
 * Pivot operation
 *
 * Spreads the distinct values of the pivot columns into output columns named
 * `<value>_<function>_<key>`. Output columns depend on the data, so the
 * projected schema after a pivot is unknown.
 */

import type { PivotValueSpec } from '@/lib/frame'
import { buildColumnList, quoteIdentifier } from '@/lib/sql/sql'
import type { OperationDefinition, PivotParams } from '../types'
import { columnCategory, issue, requireColumns } from '../validation'

const SQL_FUNCTIONS: Record<PivotValueSpec['fn'], string> = {
  sum: 'sum',
  mean: 'avg',
  count: 'count',
  min: 'min',
  max: 'max',
  first: 'first',
  last: 'last',
  len: 'count(*)',
}

export function getPivotValueSpecs(params: PivotParams): PivotValueSpec[] {
  return params.values.flatMap((value) => value.functions.map((fn) => ({ column: value.column, fn })))
}

export const pivotOperation: OperationDefinition<PivotParams> = {
  kind: 'pivot',

  label(params) {
    const values = params.values.map((v) => `${v.column}(${v.functions.join(', ')})`).join(', ')
    return `Pivot: ${values} by ${params.index.join(', ')} x ${params.columns.join(', ')}`
  },

  validate(params, ctx) {
    const issues = [
      ...requireColumns(ctx, params.index, 'index'),
      ...requireColumns(ctx, params.columns, 'columns'),
      ...requireColumns(
        ctx,
        params.values.map((v) => v.column),
        'values'
      ),
    ]

    const overlap = params.index.filter((c) => params.columns.includes(c))
    if (overlap.length > 0) {
      issues.push(issue('OVERLAPPING_COLUMNS', `Columns used as both index and pivot: ${overlap.join(', ')}`, 'columns'))
    }

    for (const value of params.values) {
      const category = columnCategory(ctx, value.column)
      if (category !== null && category !== 'numeric') {
        issues.push(
          issue('INVALID_FUNCTION', `Pivot values must be numeric; "${value.column}" is ${category}`, 'values')
        )
      }
    }

    return issues
  },

  projectColumns: () => null,

  apply: (frame, params, ctx) =>
    ctx.engine.pivot(frame, {
      index: params.index,
      on: params.columns,
      values: getPivotValueSpecs(params),
    }),

  toSql(params, ctx) {
    const using = getPivotValueSpecs(params)
      .map((spec) => {
        const call = spec.fn === 'len' ? SQL_FUNCTIONS.len : `${SQL_FUNCTIONS[spec.fn]}(${quoteIdentifier(spec.column)})`
        return `${call} AS ${quoteIdentifier(`${spec.column}_${spec.fn}`)}`
      })
      .join(', ')
    const notNull = params.columns.map((c) => `${quoteIdentifier(c)} IS NOT NULL`).join(' AND ')
    return (
      `PIVOT (SELECT * FROM ${ctx.source} WHERE ${notNull}) ` +
      `ON ${buildColumnList(params.columns)} USING ${using} GROUP BY ${buildColumnList(params.index)}`
    )
  },
}
