/**
 * Aggregate operation
 *
 * Group rows and reduce value columns. Output columns are named
 * `<column>_<function>`; without group columns the result is one global row.
 */

import type { ColumnInfo } from '@/types'
import { findColumn, getReducerOutputType, requiresNumericInput, type AggregationSpec } from '@/lib/frame'
import { buildColumnList, quoteIdentifier } from '@/lib/sql/sql'
import type { AggregateParams, OperationDefinition } from '../types'
import { columnCategory, issue, mapColumns, requireColumn, requireColumns } from '../validation'

const SQL_FUNCTIONS: Record<AggregationSpec['fn'], string> = {
  sum: 'sum',
  mean: 'avg',
  count: 'count',
  min: 'min',
  max: 'max',
  median: 'median',
  std: 'stddev_samp',
}

export function getAggregationSpecs(params: AggregateParams): AggregationSpec[] {
  return params.aggregations.flatMap((agg) =>
    agg.functions.map((fn) => ({ column: agg.column, fn, alias: `${agg.column}_${fn}` }))
  )
}

export const aggregateOperation: OperationDefinition<AggregateParams> = {
  kind: 'aggregate',

  label(params) {
    const specs = getAggregationSpecs(params).map((s) => `${s.fn}(${s.column})`)
    const by = params.groupBy.length > 0 ? ` by ${params.groupBy.join(', ')}` : ''
    return `Aggregate: ${specs.join(', ')}${by}`
  },

  validate(params, ctx) {
    const issues = requireColumns(ctx, params.groupBy, 'groupBy')

    params.aggregations.forEach((agg, i) => {
      const missing = requireColumn(ctx, agg.column, `aggregations.${i}.column`)
      if (missing.length > 0) {
        issues.push(...missing)
        return
      }
      const category = columnCategory(ctx, agg.column)
      for (const fn of agg.functions) {
        if (category !== null && category !== 'numeric' && requiresNumericInput(fn)) {
          issues.push(
            issue(
              'INVALID_FUNCTION',
              `Function "${fn}" requires a numeric column; "${agg.column}" is ${category}`,
              `aggregations.${i}.functions`
            )
          )
        }
      }
    })

    const aliases = new Set<string>()
    for (const spec of getAggregationSpecs(params)) {
      if (aliases.has(spec.alias) || params.groupBy.includes(spec.alias)) {
        issues.push(issue('DUPLICATE_OUTPUT', `Output column "${spec.alias}" would appear twice`, 'aggregations'))
      }
      aliases.add(spec.alias)
    }

    return issues
  },

  projectColumns: (params, ctx) =>
    mapColumns(ctx.columns, (columns) => {
      const keys = params.groupBy
        .map((name) => findColumn(columns, name))
        .filter((c): c is ColumnInfo => c !== undefined)
      const values = getAggregationSpecs(params).map((spec) => ({
        name: spec.alias,
        type: getReducerOutputType(spec.fn, findColumn(columns, spec.column)?.type ?? 'VARCHAR'),
        nullable: true,
      }))
      return [...keys, ...values]
    }),

  apply: (frame, params, ctx) => ctx.engine.groupBy(frame, params.groupBy, getAggregationSpecs(params)),

  toSql(params, ctx) {
    const aggregates = getAggregationSpecs(params).map(
      (spec) => `${SQL_FUNCTIONS[spec.fn]}(${quoteIdentifier(spec.column)}) AS ${quoteIdentifier(spec.alias)}`
    )
    if (params.groupBy.length === 0) {
      return `SELECT ${aggregates.join(', ')} FROM ${ctx.source}`
    }
    const keys = buildColumnList(params.groupBy)
    return `SELECT ${keys}, ${aggregates.join(', ')} FROM ${ctx.source} GROUP BY ${keys}`
  },
}
