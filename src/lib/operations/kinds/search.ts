/**
 * Search operation
 *
 * Keeps rows where any text column contains the query (case-insensitive), or
 * any numeric column equals it when the query is a number.
 */

import type { ColumnInfo, TypeCategory } from '@/types'
import { getTypeCategory, ok, toNumber, type Condition } from '@/lib/frame'
import { buildFilterCondition, combineConditions } from '@/lib/sql/filter-builder'
import { escapeLikePattern, escapeSqlString } from '@/lib/sql/sql'
import type { OperationDefinition, SearchParams } from '../types'

interface SearchTerm {
  column: string
  category: TypeCategory
  condition: Extract<Condition, { type: 'compare' }>
}

export function buildSearchTerms(columns: ColumnInfo[], query: string): SearchTerm[] {
  const numeric = toNumber(query)
  const terms: SearchTerm[] = []
  for (const column of columns) {
    const category = getTypeCategory(column.type)
    if (category === 'text') {
      terms.push({
        column: column.name,
        category,
        condition: { type: 'compare', column: column.name, operator: 'contains', value: query },
      })
    } else if (category === 'numeric' && numeric !== null) {
      terms.push({
        column: column.name,
        category,
        condition: { type: 'compare', column: column.name, operator: 'eq', value: numeric },
      })
    }
  }
  return terms
}

export const searchOperation: OperationDefinition<SearchParams> = {
  kind: 'search',

  label: (params) => `Search: '${params.query}'`,

  // Emptiness is a structural check; nothing column-specific to validate
  validate: () => [],

  projectColumns: (_params, ctx) => ctx.columns,

  async apply(frame, params, ctx) {
    const terms = buildSearchTerms(frame.columns, params.query)
    // No searchable columns: the frame passes through unchanged
    if (terms.length === 0) {
      return ok(frame)
    }
    return ctx.engine.filter(frame, { type: 'or', conditions: terms.map((t) => t.condition) })
  },

  toSql(params, ctx) {
    if (ctx.columns === null) {
      const pattern = escapeSqlString(escapeLikePattern(params.query))
      return `SELECT * FROM ${ctx.source} AS t WHERE CAST(t AS VARCHAR) ILIKE '%${pattern}%' ESCAPE '\\'`
    }
    const terms = buildSearchTerms(ctx.columns, params.query)
    if (terms.length === 0) {
      return `SELECT * FROM ${ctx.source}`
    }
    const conditions = terms.map((t) =>
      buildFilterCondition(t.column, t.condition.operator, t.condition.value, t.category)
    )
    return `SELECT * FROM ${ctx.source} WHERE ${combineConditions(conditions, 'OR')}`
  },
}
