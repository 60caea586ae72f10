/**
 * Operation parameter schemas
 *
 * Structural validation for every operation kind. Used when an operation is
 * created and again when one is read back from a saved analysis or recipe.
 */

import { z } from 'zod'
import { DEFAULT_JOIN_SUFFIX } from '@/lib/constants'

export const FILTER_OPERATORS = [
  'eq',
  'neq',
  'gt',
  'gte',
  'lt',
  'lte',
  'contains',
  'not_contains',
  'starts_with',
  'ends_with',
  'is_true',
  'is_false',
  'is_null',
  'is_not_null',
] as const

export const AGGREGATE_FUNCTIONS = ['sum', 'mean', 'count', 'min', 'max', 'median', 'std'] as const

export const PIVOT_FUNCTIONS = ['sum', 'mean', 'count', 'min', 'max', 'first', 'last', 'len'] as const

export const JOIN_HOWS = ['inner', 'left', 'outer', 'cross', 'semi', 'anti'] as const

export const OPERATION_KINDS = ['filter', 'search', 'aggregate', 'pivot', 'join', 'sort', 'column_edit'] as const

const columnName = z.string().min(1, 'Column name is required')

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const filterParamsSchema = z.object({
  column: columnName,
  operator: z.enum(FILTER_OPERATORS),
  value: cellValueSchema.optional(),
})

export const searchParamsSchema = z.object({
  query: z.string().trim().min(1, 'Search query must not be empty'),
})

export const aggregateParamsSchema = z.object({
  groupBy: z.array(columnName).default([]),
  aggregations: z
    .array(
      z.object({
        column: columnName,
        functions: z.array(z.enum(AGGREGATE_FUNCTIONS)).min(1, 'At least one aggregation function is required'),
      })
    )
    .min(1, 'At least one aggregation is required'),
})

export const pivotParamsSchema = z.object({
  index: z.array(columnName).min(1, 'At least one index column is required'),
  columns: z.array(columnName).min(1, 'At least one pivot column is required'),
  values: z
    .array(
      z.object({
        column: columnName,
        functions: z.array(z.enum(PIVOT_FUNCTIONS)).min(1, 'At least one pivot function is required'),
      })
    )
    .min(1, 'At least one value column is required'),
})

export const joinParamsSchema = z.object({
  rightDatasetId: z.string().min(1, 'Right dataset is required'),
  how: z.enum(JOIN_HOWS).default('inner'),
  leftKey: columnName.optional(),
  rightKey: columnName.optional(),
  rightSuffix: z.string().min(1).default(DEFAULT_JOIN_SUFFIX),
})

export const sortParamsSchema = z.object({
  keys: z
    .array(
      z.object({
        column: columnName,
        direction: z.enum(['asc', 'desc']).default('asc'),
      })
    )
    .min(1, 'At least one sort key is required'),
})

export const columnEditParamsSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('rename'), column: columnName, newName: columnName }),
  z.object({ action: z.literal('drop'), columns: z.array(columnName).min(1) }),
  z.object({ action: z.literal('select'), columns: z.array(columnName).min(1) }),
  z.object({ action: z.literal('cast'), column: columnName, to: z.enum(['numeric', 'text', 'date', 'boolean']) }),
  z.object({ action: z.literal('fill_null'), column: columnName, value: z.union([z.string(), z.number(), z.boolean()]) }),
])

export const operationSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('filter'), params: filterParamsSchema }),
  z.object({ kind: z.literal('search'), params: searchParamsSchema }),
  z.object({ kind: z.literal('aggregate'), params: aggregateParamsSchema }),
  z.object({ kind: z.literal('pivot'), params: pivotParamsSchema }),
  z.object({ kind: z.literal('join'), params: joinParamsSchema }),
  z.object({ kind: z.literal('sort'), params: sortParamsSchema }),
  z.object({ kind: z.literal('column_edit'), params: columnEditParamsSchema }),
])

export type FilterParams = z.infer<typeof filterParamsSchema>
export type SearchParams = z.infer<typeof searchParamsSchema>
export type AggregateParams = z.infer<typeof aggregateParamsSchema>
export type PivotParams = z.infer<typeof pivotParamsSchema>
export type JoinParams = z.infer<typeof joinParamsSchema>
export type SortParams = z.infer<typeof sortParamsSchema>
export type ColumnEditParams = z.infer<typeof columnEditParamsSchema>

/** What callers hand to createOperation; defaults are filled in by parsing */
export type OperationSpecInput = z.input<typeof operationSpecSchema>
