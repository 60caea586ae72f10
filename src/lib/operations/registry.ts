/**
 * Operation Registry
 *
 * Maps each operation kind to its definition. Transforms are always derived
 * from kind + params through this table, never stored alongside an operation.
 */

import type { ColumnInfo, DataFrame } from '@/types'
import type { EngineResult } from '@/lib/frame'
import { aggregateOperation } from './kinds/aggregate'
import { columnEditOperation } from './kinds/column-edit'
import { filterOperation } from './kinds/filter'
import { joinOperation } from './kinds/join'
import { pivotOperation } from './kinds/pivot'
import { searchOperation } from './kinds/search'
import { sortOperation } from './kinds/sort'
import type {
  OperationContext,
  OperationDefinitionMap,
  OperationKind,
  OperationSpec,
  SqlContext,
  ValidationContext,
  ValidationIssue,
} from './types'

const OPERATION_DEFINITIONS: OperationDefinitionMap = {
  filter: filterOperation,
  search: searchOperation,
  aggregate: aggregateOperation,
  pivot: pivotOperation,
  join: joinOperation,
  sort: sortOperation,
  column_edit: columnEditOperation,
}

/**
 * Human-readable names per kind, for menus and summaries
 */
export const OPERATION_KIND_LABELS: Record<OperationKind, string> = {
  filter: 'Filter',
  search: 'Search',
  aggregate: 'Aggregate',
  pivot: 'Pivot',
  join: 'Join',
  sort: 'Sort',
  column_edit: 'Edit Columns',
}

export function getOperationKinds(): OperationKind[] {
  return Object.keys(OPERATION_KIND_LABELS).filter(isOperationKind)
}

export function isOperationKind(value: string): value is OperationKind {
  return value in OPERATION_DEFINITIONS
}

export function getDefinition<K extends OperationKind>(kind: K): OperationDefinitionMap[K] {
  return OPERATION_DEFINITIONS[kind]
}

// ===== SPEC DISPATCH =====

export function labelFor<K extends OperationKind>(spec: OperationSpec<K>): string {
  return getDefinition(spec.kind).label(spec.params)
}

export function validateSpec<K extends OperationKind>(spec: OperationSpec<K>, ctx: ValidationContext): ValidationIssue[] {
  return getDefinition(spec.kind).validate(spec.params, ctx)
}

export function projectColumnsFor<K extends OperationKind>(
  spec: OperationSpec<K>,
  ctx: ValidationContext
): ColumnInfo[] | null {
  return getDefinition(spec.kind).projectColumns(spec.params, ctx)
}

export function applySpec<K extends OperationKind>(
  spec: OperationSpec<K>,
  frame: DataFrame,
  ctx: OperationContext
): Promise<EngineResult> {
  return getDefinition(spec.kind).apply(frame, spec.params, ctx)
}

export function sqlFor<K extends OperationKind>(spec: OperationSpec<K>, ctx: SqlContext): string {
  return getDefinition(spec.kind).toSql(spec.params, ctx)
}
