import type { FilterOperator, TypeCategory } from '@/types'

/**
 * Column type categories.
 *
 * Maps declared column types (DuckDB-style names: BIGINT, DOUBLE, VARCHAR, ...)
 * to the logical categories used for operator validation and display.
 */

/**
 * Determine the type category for a declared column type
 */
export function getTypeCategory(columnType: string): TypeCategory {
  const type = columnType.toUpperCase()

  // Nested types first: "LIST(INTEGER)" contains INT
  if (type.startsWith('LIST') || type.startsWith('STRUCT') || type.startsWith('MAP') || type.endsWith('[]')) {
    return 'unknown'
  }

  if (
    type.includes('INT') ||
    type.includes('DECIMAL') ||
    type.includes('NUMERIC') ||
    type.includes('FLOAT') ||
    type.includes('DOUBLE') ||
    type.includes('REAL')
  ) {
    return 'numeric'
  }

  if (type.includes('DATE') || type.includes('TIME') || type === 'INTERVAL') {
    return 'date'
  }

  if (type === 'BOOLEAN' || type === 'BOOL') {
    return 'boolean'
  }

  if (
    type.includes('VARCHAR') ||
    type.includes('CHAR') ||
    type.includes('TEXT') ||
    type === 'STRING' ||
    type === 'UUID'
  ) {
    return 'text'
  }

  return 'unknown'
}

/**
 * Declared column type produced when a column is converted to a category
 */
export function getColumnTypeForCategory(category: TypeCategory): string {
  switch (category) {
    case 'numeric':
      return 'DOUBLE'
    case 'date':
      return 'TIMESTAMP'
    case 'boolean':
      return 'BOOLEAN'
    case 'text':
      return 'VARCHAR'
    case 'unknown':
      return 'UNKNOWN'
  }
}

const OPERATORS_BY_CATEGORY: Record<TypeCategory, FilterOperator[]> = {
  numeric: ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'is_null', 'is_not_null'],
  date: ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'is_null', 'is_not_null'],
  text: ['eq', 'neq', 'contains', 'not_contains', 'starts_with', 'ends_with', 'is_null', 'is_not_null'],
  boolean: ['eq', 'neq', 'is_true', 'is_false', 'is_null', 'is_not_null'],
  // Unknown types get text operators as fallback
  unknown: ['eq', 'neq', 'contains', 'not_contains', 'is_null', 'is_not_null'],
}

/**
 * Get valid filter operators for a type category
 */
export function getOperatorsForCategory(category: TypeCategory): FilterOperator[] {
  return OPERATORS_BY_CATEGORY[category]
}

export function isOperatorValidForCategory(operator: FilterOperator, category: TypeCategory): boolean {
  return OPERATORS_BY_CATEGORY[category].includes(operator)
}

/**
 * Operators that take no comparison value
 */
export const UNARY_OPERATORS: ReadonlySet<FilterOperator> = new Set([
  'is_true',
  'is_false',
  'is_null',
  'is_not_null',
])

/**
 * Human-readable labels for filter operators
 */
export function getOperatorLabel(operator: FilterOperator): string {
  const labels: Record<FilterOperator, string> = {
    eq: '=',
    neq: '!=',
    gt: '>',
    gte: '>=',
    lt: '<',
    lte: '<=',
    contains: 'contains',
    not_contains: 'does not contain',
    starts_with: 'starts with',
    ends_with: 'ends with',
    is_true: 'is true',
    is_false: 'is false',
    is_null: 'is null',
    is_not_null: 'is not null',
  }
  return labels[operator]
}

/**
 * Two join keys can be matched when they share a category
 * (int/float promotion is covered by the numeric category).
 */
export function areCategoriesCompatible(left: TypeCategory, right: TypeCategory): boolean {
  return left === right
}
