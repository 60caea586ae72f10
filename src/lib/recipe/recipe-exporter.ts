/**
 * Recipe Exporter
 *
 * Builds a recipe from a session's history. Only steps that depend on the
 * schema alone are kept: joins name another loaded dataset and cannot be
 * replayed elsewhere.
 */

import type { ColumnInfo } from '@/types'
import { getTypeCategory } from '@/lib/frame'
import type { Operation, OperationKind, OperationSpec } from '@/lib/operations'
import type { Recipe, RecipeStep, RequiredColumn } from '@/lib/persistence/schemas'
import { generateId } from '@/lib/utils'

const EXCLUDED_KINDS: ReadonlySet<OperationKind> = new Set(['join'])

export function isRecipeCompatible(spec: OperationSpec): boolean {
  return !EXCLUDED_KINDS.has(spec.kind)
}

/**
 * Steps from the entries that are in effect: executed or still queued.
 * Failed and undone entries are left out.
 */
export function extractRecipeSteps(entries: readonly Operation[]): RecipeStep[] {
  const steps: RecipeStep[] = []
  for (const op of entries) {
    if (op.state !== 'executed' && op.state !== 'queued') continue
    if (!isRecipeCompatible(op.spec)) continue
    steps.push({ ...op.spec, label: op.label })
  }
  return steps
}

/**
 * Column names a step reads from its input
 */
export function referencedColumns(spec: OperationSpec): string[] {
  switch (spec.kind) {
    case 'filter':
      return [spec.params.column]
    case 'search':
      return []
    case 'aggregate':
      return [...spec.params.groupBy, ...spec.params.aggregations.map((a) => a.column)]
    case 'pivot':
      return [...spec.params.index, ...spec.params.columns, ...spec.params.values.map((v) => v.column)]
    case 'join':
      return spec.params.leftKey === undefined ? [] : [spec.params.leftKey]
    case 'sort':
      return spec.params.keys.map((k) => k.column)
    case 'column_edit':
      return 'columns' in spec.params ? spec.params.columns : [spec.params.column]
  }
}

/**
 * Source columns the steps need, with the category they had when recorded.
 * A name introduced by an earlier rename is not a requirement.
 */
export function extractRequiredColumns(steps: readonly OperationSpec[], baseColumns: ColumnInfo[]): RequiredColumn[] {
  const base = new Map(baseColumns.map((c) => [c.name, c]))
  const introduced = new Set<string>()
  const required = new Map<string, RequiredColumn>()

  for (const step of steps) {
    for (const name of referencedColumns(step)) {
      const column = base.get(name)
      if (!column || introduced.has(name) || required.has(name)) continue
      required.set(name, { name, category: getTypeCategory(column.type) })
    }
    if (step.kind === 'column_edit' && step.params.action === 'rename') {
      introduced.add(step.params.newName)
    }
  }

  return [...required.values()].sort((a, b) => a.name.localeCompare(b.name))
}

export interface BuildRecipeOptions {
  name: string
  description?: string | null
  /** Columns of the dataset the history was recorded on */
  baseColumns: ColumnInfo[]
  now?: Date
}

export function buildRecipe(entries: readonly Operation[], options: BuildRecipeOptions): Recipe {
  const steps = extractRecipeSteps(entries)
  const timestamp = (options.now ?? new Date()).toISOString()
  return {
    id: generateId(),
    name: options.name,
    description: options.description ?? null,
    createdAt: timestamp,
    modifiedAt: timestamp,
    requiredColumns: extractRequiredColumns(steps, options.baseColumns),
    steps,
  }
}
