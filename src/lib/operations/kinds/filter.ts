/**
 * Filter operation
 *
 * Keeps the rows where one column satisfies one comparison.
 */

import type { CellValue } from '@/types'
import { getOperatorLabel, getOperatorsForCategory, isOperatorValidForCategory, UNARY_OPERATORS } from '@/lib/frame'
import { buildFilterCondition } from '@/lib/sql/filter-builder'
import type { FilterParams, OperationDefinition } from '../types'
import { columnCategory, issue, requireColumn } from '../validation'

function formatValue(value: CellValue | undefined): string {
  if (typeof value === 'string') return `"${value}"`
  return String(value)
}

export function formatFilterForDisplay(params: FilterParams): string {
  const operator = getOperatorLabel(params.operator)
  if (UNARY_OPERATORS.has(params.operator)) {
    return `${params.column} ${operator}`
  }
  return `${params.column} ${operator} ${formatValue(params.value)}`
}

export const filterOperation: OperationDefinition<FilterParams> = {
  kind: 'filter',

  label: (params) => `Filter: ${formatFilterForDisplay(params)}`,

  validate(params, ctx) {
    const issues = requireColumn(ctx, params.column, 'column')
    if (issues.length > 0) return issues

    const category = columnCategory(ctx, params.column)
    if (category !== null && !isOperatorValidForCategory(params.operator, category)) {
      const allowed = getOperatorsForCategory(category).join(', ')
      issues.push(
        issue(
          'INVALID_OPERATOR',
          `Operator "${params.operator}" is not valid for ${category} column "${params.column}" (allowed: ${allowed})`,
          'operator'
        )
      )
    }

    if (!UNARY_OPERATORS.has(params.operator) && (params.value === undefined || params.value === null)) {
      issues.push(issue('VALUE_REQUIRED', `Operator "${params.operator}" requires a value`, 'value'))
    }

    return issues
  },

  projectColumns: (_params, ctx) => ctx.columns,

  apply: (frame, params, ctx) =>
    ctx.engine.filter(frame, {
      type: 'compare',
      column: params.column,
      operator: params.operator,
      value: params.value,
    }),

  toSql(params, ctx) {
    const category = ctx.columns === null ? null : columnCategory(ctx, params.column)
    const condition = buildFilterCondition(params.column, params.operator, params.value, category)
    return `SELECT * FROM ${ctx.source} WHERE ${condition}`
  },
}
