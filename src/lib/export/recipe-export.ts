/**
 * Recipe JSON export/import
 */

import type { Operation } from '@/lib/operations'
import { recipeSchema, type Recipe } from '@/lib/persistence/schemas'
import { buildRecipe, type BuildRecipeOptions } from '@/lib/recipe/recipe-exporter'

export class RecipeFormatError extends Error {
  constructor(reason: string) {
    super(`Invalid recipe file: ${reason}`)
    this.name = 'RecipeFormatError'
  }
}

export function exportRecipe(entries: readonly Operation[], options: BuildRecipeOptions): string {
  return JSON.stringify(buildRecipe(entries, options), null, 2)
}

/**
 * @throws RecipeFormatError when the text is not JSON or not a recipe
 */
export function importRecipe(text: string): Recipe {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new RecipeFormatError(error instanceof Error ? error.message : String(error))
  }
  const parsed = recipeSchema.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new RecipeFormatError(`${first.path.join('.') || '(root)'}: ${first.message}`)
  }
  return parsed.data
}
