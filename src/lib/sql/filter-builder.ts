/**
 * Filter SQL Builder
 *
 * Renders filter conditions as DuckDB WHERE clauses. Text matching mirrors the
 * engine: equality is exact, contains/starts/ends are case-insensitive (ILIKE).
 */

import type { CellValue, FilterOperator, TypeCategory } from '@/types'
import { escapeLikePattern, escapeSqlString, quoteIdentifier, toSqlValue } from './sql'

const COMPARISON_SQL: Partial<Record<FilterOperator, string>> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
}

/**
 * SQL comparison operator for an ordered filter operator
 */
export function getComparisonSql(operator: FilterOperator): string {
  return COMPARISON_SQL[operator] ?? '='
}

function likeCondition(column: string, pattern: string, negate = false): string {
  return `CAST(${column} AS VARCHAR) ${negate ? 'NOT ILIKE' : 'ILIKE'} '${pattern}' ESCAPE '\\'`
}

/**
 * Build a single filter condition. `category` is the column's type category
 * when known; comparisons on unknown columns fall back to text.
 */
export function buildFilterCondition(
  columnName: string,
  operator: FilterOperator,
  value: CellValue | undefined,
  category: TypeCategory | null
): string {
  const column = quoteIdentifier(columnName)

  switch (operator) {
    case 'is_null':
      return `${column} IS NULL`
    case 'is_not_null':
      return `${column} IS NOT NULL`
    case 'is_true':
      return `${column} = TRUE`
    case 'is_false':
      return `${column} = FALSE`
    case 'contains':
    case 'not_contains': {
      const pattern = escapeSqlString(escapeLikePattern(String(value ?? '')))
      return likeCondition(column, `%${pattern}%`, operator === 'not_contains')
    }
    case 'starts_with':
      return likeCondition(column, `${escapeSqlString(escapeLikePattern(String(value ?? '')))}%`)
    case 'ends_with':
      return likeCondition(column, `%${escapeSqlString(escapeLikePattern(String(value ?? '')))}`)
    default:
      break
  }

  const comparison = getComparisonSql(operator)
  if (category === 'date' && typeof value === 'string') {
    return `${column} ${comparison} CAST(${toSqlValue(value)} AS TIMESTAMP)`
  }
  if (category === 'text' || category === 'unknown' || category === null) {
    return `CAST(${column} AS VARCHAR) ${comparison} ${toSqlValue(value === undefined || value === null ? null : String(value))}`
  }
  return `${column} ${comparison} ${toSqlValue(value)}`
}

/**
 * Join several conditions; an empty list renders as FALSE for OR and TRUE for AND.
 */
export function combineConditions(conditions: string[], joiner: 'AND' | 'OR'): string {
  if (conditions.length === 0) {
    return joiner === 'AND' ? 'TRUE' : 'FALSE'
  }
  if (conditions.length === 1) {
    return conditions[0]
  }
  return conditions.map((c) => `(${c})`).join(` ${joiner} `)
}
