/**
 * Column Matcher for Recipe Execution
 *
 * Matches the columns a recipe was recorded against to the columns of the
 * dataset it is applied to, then rewrites step params to the matched names.
 */

import type { ColumnInfo, TypeCategory } from '@/types'
import { getTypeCategory } from '@/lib/frame'
import type { OperationSpec } from '@/lib/operations'
import type { RequiredColumn } from '@/lib/persistence/schemas'

/** Recipe column name -> dataset column name */
export type ColumnMapping = Record<string, string>

export interface MatchResult {
  mapping: ColumnMapping
  /** Recipe columns with no counterpart */
  unmapped: string[]
  exactMatches: string[]
  /** Matched ignoring case, or treating spaces, hyphens and underscores alike */
  looseMatches: string[]
}

export interface TypeMismatch {
  column: string
  expected: TypeCategory
  actual: TypeCategory
}

export interface SchemaCheck {
  valid: boolean
  mapping: ColumnMapping
  missing: string[]
  mismatched: TypeMismatch[]
}

/**
 * "First Name", "first-name" and "FIRST_NAME" all become "first_name"
 */
export function normalizeColumnName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[\s\-_]+/g, '_')
    .replace(/^_|_$/g, '')
}

/**
 * Three passes per recipe column: exact, case-insensitive, normalized.
 * A dataset column is used at most once.
 */
export function matchColumns(recipeColumns: string[], tableColumns: string[]): MatchResult {
  const lowerMap = new Map<string, string>()
  const normalizedMap = new Map<string, string>()
  for (const col of tableColumns) {
    if (!lowerMap.has(col.toLowerCase())) lowerMap.set(col.toLowerCase(), col)
    if (!normalizedMap.has(normalizeColumnName(col))) normalizedMap.set(normalizeColumnName(col), col)
  }

  const result: MatchResult = { mapping: {}, unmapped: [], exactMatches: [], looseMatches: [] }
  const used = new Set<string>()
  const available = new Set(tableColumns)

  // Exact matches first so a loose match never steals an exact one
  for (const recipeCol of recipeColumns) {
    if (available.has(recipeCol)) {
      result.mapping[recipeCol] = recipeCol
      used.add(recipeCol)
      result.exactMatches.push(recipeCol)
    }
  }

  for (const recipeCol of recipeColumns) {
    if (recipeCol in result.mapping) continue
    const candidate = lowerMap.get(recipeCol.toLowerCase()) ?? normalizedMap.get(normalizeColumnName(recipeCol))
    if (candidate !== undefined && !used.has(candidate)) {
      result.mapping[recipeCol] = candidate
      used.add(candidate)
      result.looseMatches.push(recipeCol)
    } else {
      result.unmapped.push(recipeCol)
    }
  }

  return result
}

/**
 * Check a dataset against a recipe's required columns. A required column of
 * category unknown matches any type.
 */
export function validateRecipeSchema(required: RequiredColumn[], columns: ColumnInfo[]): SchemaCheck {
  const match = matchColumns(
    required.map((c) => c.name),
    columns.map((c) => c.name)
  )
  const byName = new Map(columns.map((c) => [c.name, c]))

  const mismatched: TypeMismatch[] = []
  for (const req of required) {
    const target = match.mapping[req.name]
    const column = target === undefined ? undefined : byName.get(target)
    if (!column || req.category === 'unknown') continue
    const actual = getTypeCategory(column.type)
    if (actual !== req.category) {
      mismatched.push({ column: req.name, expected: req.category, actual })
    }
  }

  return {
    valid: match.unmapped.length === 0 && mismatched.length === 0,
    mapping: match.mapping,
    missing: match.unmapped,
    mismatched,
  }
}

/**
 * Rewrite every column reference in a step to its mapped name. Names with no
 * mapping (columns the recipe itself creates) are left alone.
 */
export function applyMappingToSpec(spec: OperationSpec, mapping: ColumnMapping): OperationSpec {
  const m = (column: string): string => mapping[column] ?? column

  switch (spec.kind) {
    case 'filter':
      return { kind: 'filter', params: { ...spec.params, column: m(spec.params.column) } }
    case 'search':
      return spec
    case 'aggregate':
      return {
        kind: 'aggregate',
        params: {
          groupBy: spec.params.groupBy.map(m),
          aggregations: spec.params.aggregations.map((a) => ({ ...a, column: m(a.column) })),
        },
      }
    case 'pivot':
      return {
        kind: 'pivot',
        params: {
          index: spec.params.index.map(m),
          columns: spec.params.columns.map(m),
          values: spec.params.values.map((v) => ({ ...v, column: m(v.column) })),
        },
      }
    case 'join':
      return {
        kind: 'join',
        params: {
          ...spec.params,
          leftKey: spec.params.leftKey === undefined ? undefined : m(spec.params.leftKey),
        },
      }
    case 'sort':
      return { kind: 'sort', params: { keys: spec.params.keys.map((k) => ({ ...k, column: m(k.column) })) } }
    case 'column_edit': {
      const params = spec.params
      switch (params.action) {
        case 'drop':
        case 'select':
          return { kind: 'column_edit', params: { ...params, columns: params.columns.map(m) } }
        case 'rename':
        case 'cast':
        case 'fill_null':
          return { kind: 'column_edit', params: { ...params, column: m(params.column) } }
      }
    }
  }
}
