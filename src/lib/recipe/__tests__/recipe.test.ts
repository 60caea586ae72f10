import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ExecutionMode } from '@/types'
import type { OperationSpecInput } from '@/lib/operations'
import { DatasetSession } from '@/lib/session/dataset-session'
import type { Recipe } from '@/lib/persistence/schemas'
import { RecipeRepository } from '@/lib/persistence/recipe-repository'
import { buildRecipe, extractRecipeSteps } from '@/lib/recipe/recipe-exporter'
import { matchColumns, normalizeColumnName, validateRecipeSchema } from '@/lib/recipe/column-matcher'
import {
  applyRecipe,
  previewRecipe,
  RecipeSchemaError,
  type RecipeExecutionProgress,
} from '@/lib/recipe/recipe-executor'
import { createWorkspaceStore } from '@/stores/workspaceStore'
import { cities, column, frameOf, passengers, values } from '@/test/fixtures'

const created = new Date(Date.UTC(2024, 4, 1, 12, 0, 0))

/** Recorded on passengers: filter, join, rename, sort */
async function recordedRecipe(): Promise<Recipe> {
  const workspace = createWorkspaceStore({ defaultMode: 'eager' })
  workspace.getState().openDataset({ name: 'cities', base: cities() })
  const opened = workspace.getState().openDataset({ name: 'passengers', base: passengers() })
  if (!opened.session) throw new Error('workspace is full')
  const session = opened.session

  const specs: OperationSpecInput[] = [
    { kind: 'filter', params: { column: 'Age', operator: 'gt', value: 30 } },
    { kind: 'join', params: { rightDatasetId: 'cities', leftKey: 'City', rightKey: 'City' } },
    { kind: 'column_edit', params: { action: 'rename', column: 'Name', newName: 'Passenger' } },
    { kind: 'sort', params: { keys: [{ column: 'Passenger', direction: 'asc' }] } },
  ]
  for (const spec of specs) {
    await session.submitOperation(spec).task?.promise
  }

  return buildRecipe(session.history.entries, {
    name: 'over 30',
    baseColumns: session.baseFrame.columns,
    now: created,
  })
}

function lowercasePassengers(mode: ExecutionMode): DatasetSession {
  const base = frameOf(
    [column('name', 'VARCHAR'), column('age', 'BIGINT'), column('fare', 'DOUBLE')],
    [
      { name: 'Ann', age: 25, fare: 7.25 },
      { name: 'Bob', age: 40, fare: 71.5 },
      { name: 'Cy', age: 31, fare: 8.05 },
    ]
  )
  return new DatasetSession({ name: 'manifest', base, mode })
}

function recipeOf(steps: Recipe['steps'], requiredColumns: Recipe['requiredColumns'] = []): Recipe {
  return {
    id: 'recipe-1',
    name: 'handmade',
    description: null,
    createdAt: created.toISOString(),
    modifiedAt: created.toISOString(),
    requiredColumns,
    steps,
  }
}

describe('buildRecipe', () => {
  it('keeps schema-only steps and records the source columns they read', async () => {
    const recipe = await recordedRecipe()

    expect(recipe.steps.map((s) => s.kind)).toEqual(['filter', 'column_edit', 'sort'])
    expect(recipe.requiredColumns).toEqual([
      { name: 'Age', category: 'numeric' },
      { name: 'Name', category: 'text' },
    ])
    expect(recipe.createdAt).toBe('2024-05-01T12:00:00.000Z')
    expect(recipe.description).toBeNull()
    expect(recipe.id).not.toBe('')
  })

  it('leaves failed and undone entries out', async () => {
    const session = new DatasetSession({ name: 'passengers', base: passengers(), mode: 'eager' })
    const first = session.submitOperation({ kind: 'filter', params: { column: 'Age', operator: 'gt', value: 30 } })
    await first.task?.promise
    const second = session.submitOperation({ kind: 'filter', params: { column: 'Fare', operator: 'lt', value: 'abc' } })
    await second.task?.promise

    expect(extractRecipeSteps(session.history.entries).map((s) => s.label)).toEqual(['Filter: Age > 30'])
  })

  it('numbers steps for preview', async () => {
    const recipe = await recordedRecipe()

    expect(previewRecipe(recipe)).toEqual([
      '1. Filter: Age > 30',
      '2. Rename: Name → Passenger',
      '3. Sort: Passenger asc',
    ])
  })
})

describe('column matching', () => {
  it('normalizes case and separators', () => {
    expect(normalizeColumnName(' First-Name ')).toBe('first_name')
    expect(normalizeColumnName('FIRST_NAME')).toBe('first_name')
  })

  it('prefers exact matches, then case-insensitive, then normalized', () => {
    const result = matchColumns(['Name', 'first name', 'AGE'], ['name', 'Name', 'First_Name', 'age'])

    expect(result.mapping).toEqual({ Name: 'Name', 'first name': 'First_Name', AGE: 'age' })
    expect(result.exactMatches).toEqual(['Name'])
    expect(result.looseMatches).toEqual(['first name', 'AGE'])
    expect(result.unmapped).toEqual([])
  })

  it('uses each dataset column once', () => {
    const result = matchColumns(['name', 'NAME'], ['Name'])

    expect(result.mapping).toEqual({ name: 'Name' })
    expect(result.unmapped).toEqual(['NAME'])
  })

  it('reports missing columns and type mismatches', () => {
    const check = validateRecipeSchema(
      [
        { name: 'Age', category: 'numeric' },
        { name: 'Name', category: 'text' },
        { name: 'Notes', category: 'unknown' },
      ],
      [column('age', 'VARCHAR'), column('notes', 'BOOLEAN')]
    )

    expect(check.valid).toBe(false)
    expect(check.missing).toEqual(['Name'])
    expect(check.mismatched).toEqual([{ column: 'Age', expected: 'numeric', actual: 'text' }])
    expect(check.mapping).toEqual({ Age: 'age', Notes: 'notes' })
  })
})

describe('applyRecipe', () => {
  it('replays steps against matched column names', async () => {
    const recipe = await recordedRecipe()
    const session = lowercasePassengers('eager')
    const progress: RecipeExecutionProgress[] = []

    const result = await applyRecipe(session, recipe, (p) => progress.push(p))

    expect(result).toMatchObject({ success: 3, failed: 0, skipped: 0, errors: [] })
    expect(values(session.frame, 'Passenger')).toEqual(['Bob', 'Cy'])
    expect(session.history.entries.map((op) => op.label)).toEqual([
      'Filter: age > 30',
      'Rename: name → Passenger',
      'Sort: Passenger asc',
    ])
    expect(progress.map((p) => p.currentStep)).toEqual([1, 2, 3])
    expect(progress[0].totalSteps).toBe(3)
  })

  it('queues steps in lazy mode', async () => {
    const recipe = await recordedRecipe()
    const session = lowercasePassengers('lazy')

    const result = await applyRecipe(session, recipe)

    expect(result.success).toBe(3)
    expect(session.history.entries.map((op) => op.state)).toEqual(['queued', 'queued', 'queued'])
    expect(values(session.frame, 'name')).toEqual(['Ann', 'Bob', 'Cy'])
  })

  it('rejects a dataset that lacks a required column before recording anything', async () => {
    const recipe = await recordedRecipe()
    const session = new DatasetSession({
      name: 'fares',
      base: frameOf([column('name', 'VARCHAR'), column('fare', 'DOUBLE')], [{ name: 'Ann', fare: 7.25 }]),
      mode: 'eager',
    })

    const error = await applyRecipe(session, recipe).then(
      () => null,
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(RecipeSchemaError)
    expect(error instanceof RecipeSchemaError && error.check.missing).toEqual(['Age'])
    expect(error instanceof Error && error.message).toBe('Recipe "over 30" does not fit this dataset: missing column "Age"')
    expect(session.history.entries).toHaveLength(0)
  })

  it('describes type mismatches in the schema error', async () => {
    const recipe = await recordedRecipe()
    const session = new DatasetSession({
      name: 'text ages',
      base: frameOf([column('Name', 'VARCHAR'), column('Age', 'VARCHAR')], [{ Name: 'Ann', Age: 'young' }]),
      mode: 'eager',
    })

    await expect(applyRecipe(session, recipe)).rejects.toThrow(
      'Recipe "over 30" does not fit this dataset: column "Age" is text, expected numeric'
    )
  })

  it('stops at a step that fails to execute', async () => {
    const recipe = recipeOf([
      { kind: 'filter', params: { column: 'Fare', operator: 'lt', value: 'abc' }, label: 'Filter: Fare < "abc"' },
      { kind: 'sort', params: { keys: [{ column: 'Age', direction: 'asc' }] }, label: 'Sort: Age asc' },
    ])
    const session = new DatasetSession({ name: 'passengers', base: passengers(), mode: 'eager' })

    const result = await applyRecipe(session, recipe)

    expect(result.success).toBe(0)
    expect(result.failed).toBe(1)
    expect(result.skipped).toBe(1)
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0].step).toBe(0)
    expect(result.errors[0].label).toBe('Filter: Fare < "abc"')
    expect(session.history.entries.map((op) => op.state)).toEqual(['failed'])
  })

  it('continues past a step that fails validation', async () => {
    const recipe = recipeOf([
      { kind: 'filter', params: { column: 'Missing', operator: 'gt', value: 1 }, label: 'Filter: Missing > 1' },
      { kind: 'sort', params: { keys: [{ column: 'Age', direction: 'desc' }] }, label: 'Sort: Age desc' },
    ])
    const session = new DatasetSession({ name: 'passengers', base: passengers(), mode: 'eager' })

    const result = await applyRecipe(session, recipe)

    expect(result.success).toBe(1)
    expect(result.failed).toBe(1)
    expect(result.skipped).toBe(0)
    expect(result.errors.map((e) => e.step)).toEqual([0])
    expect(result.operations).toHaveLength(1)
    expect(values(session.frame, 'Age')).toEqual([40, 31, 25])
  })
})

describe('RecipeRepository', () => {
  let dataDir: string

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'frameflow-recipes-'))
  })

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true })
  })

  it('saves, lists, loads and deletes recipes', async () => {
    const now = () => new Date(2024, 5, 1, 8, 30, 0)
    const repository = new RecipeRepository({ dataDir, now })
    const recipe = recipeOf([
      { kind: 'sort', params: { keys: [{ column: 'Age', direction: 'asc' }] }, label: 'Sort: Age asc' },
    ])

    const saved = await repository.save(recipe)

    expect(saved.modifiedAt).toBe(new Date(2024, 5, 1, 8, 30, 0).toISOString())
    expect(await repository.load('recipe-1')).toEqual(saved)
    expect((await repository.list()).map((r) => r.id)).toEqual(['recipe-1'])
    expect(await repository.delete('recipe-1')).toBe(true)
    expect(await repository.load('recipe-1')).toBeNull()
  })

  it('replaces a recipe with the same id and versions a clashing name', async () => {
    const repository = new RecipeRepository({ dataDir, now: () => new Date(2024, 5, 1, 8, 30, 0) })
    const first = recipeOf([])

    await repository.save(first)
    await repository.save({ ...first, description: 'edited' })
    const other = await repository.save({ ...first, id: 'recipe-2' })

    const list = await repository.list()
    expect(list).toHaveLength(2)
    expect((await repository.load('recipe-1'))?.description).toBe('edited')
    expect(other.name).toBe('handmade_20240601_083000')
  })
})
