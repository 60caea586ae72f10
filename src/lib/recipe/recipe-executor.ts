/**
 * Recipe Executor
 *
 * Applies recipe steps to a session, one recorded operation per step.
 * In eager mode each step runs before the next is recorded; in lazy mode the
 * steps are queued and the caller decides when to execute.
 */

import type { ColumnInfo } from '@/types'
import { parseOperationSpec, ValidationError, type Operation } from '@/lib/operations'
import type { Recipe } from '@/lib/persistence/schemas'
import type { DatasetSession } from '@/lib/session/dataset-session'
import type { SubmitResult } from '@/lib/session/types'
import { applyMappingToSpec, validateRecipeSchema, type SchemaCheck } from './column-matcher'

export class RecipeSchemaError extends Error {
  readonly check: SchemaCheck

  constructor(recipeName: string, check: SchemaCheck) {
    const problems = [
      ...check.missing.map((c) => `missing column "${c}"`),
      ...check.mismatched.map((m) => `column "${m.column}" is ${m.actual}, expected ${m.expected}`),
    ]
    super(`Recipe "${recipeName}" does not fit this dataset: ${problems.join('; ')}`)
    this.name = 'RecipeSchemaError'
    this.check = check
  }
}

export interface RecipeStepError {
  /** Zero-based position in the recipe */
  step: number
  label: string
  message: string
}

export interface RecipeExecutionProgress {
  currentStep: number
  totalSteps: number
  currentStepLabel: string
}

export interface ApplyRecipeResult {
  success: number
  failed: number
  /** Steps never recorded because an earlier step failed to execute */
  skipped: number
  errors: RecipeStepError[]
  operations: Operation[]
}

/**
 * @throws RecipeSchemaError before anything is recorded when the session's
 *   columns do not satisfy the recipe
 */
export async function applyRecipe(
  session: DatasetSession,
  recipe: Recipe,
  onProgress?: (progress: RecipeExecutionProgress) => void
): Promise<ApplyRecipeResult> {
  const check = checkRecipe(recipe, session.columns)
  if (!check.valid) {
    console.warn(`[Recipe] "${recipe.name}" rejected for ${session.name}`)
    throw new RecipeSchemaError(recipe.name, check)
  }

  console.log(`[Recipe] Applying "${recipe.name}" (${recipe.steps.length} steps) to ${session.name}`)
  const result: ApplyRecipeResult = { success: 0, failed: 0, skipped: 0, errors: [], operations: [] }

  for (let i = 0; i < recipe.steps.length; i++) {
    const step = recipe.steps[i]
    onProgress?.({ currentStep: i + 1, totalSteps: recipe.steps.length, currentStepLabel: step.label })

    const spec = applyMappingToSpec(parseOperationSpec({ kind: step.kind, params: step.params }), check.mapping)

    let submitted: SubmitResult
    try {
      submitted = session.submitOperation(spec)
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error
      result.failed++
      result.errors.push({ step: i, label: step.label, message: error.message })
      console.warn(`[Recipe] Step ${i + 1} rejected: ${error.message}`)
      continue
    }
    result.operations.push(submitted.operation)

    const summary = submitted.task ? await submitted.task.promise : null
    const op = submitted.operation

    // A pass that left the step queued halted on an earlier entry
    if (op.state === 'failed' || (summary !== null && op.state !== 'executed')) {
      result.failed++
      result.errors.push({
        step: i,
        label: step.label,
        message: op.error?.message ?? summary?.firstFailure?.message ?? 'Operation did not run',
      })
      result.skipped = recipe.steps.length - i - 1
      console.error(`[Recipe] Step ${i + 1} failed, stopping: ${step.label}`)
      break
    }
    result.success++
  }

  console.log(`[Recipe] "${recipe.name}": ${result.success} applied, ${result.failed} failed, ${result.skipped} skipped`)
  return result
}

export function checkRecipe(recipe: Recipe, columns: ColumnInfo[]): SchemaCheck {
  return validateRecipeSchema(recipe.requiredColumns, columns)
}

/** Numbered step labels */
export function previewRecipe(recipe: Recipe): string[] {
  return recipe.steps.map((step, index) => `${index + 1}. ${step.label}`)
}
