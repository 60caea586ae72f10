/**
 * Recipe Repository
 */

import { join } from 'node:path'
import { RECIPES_FILE, STORE_FORMAT_VERSION } from '@/lib/constants'
import { JsonFileStore } from './json-store'
import { versionedName, type RepositoryOptions } from './analysis-repository'
import { recipeSchema, recipesDocumentSchema, type Recipe } from './schemas'

export class RecipeRepository {
  private readonly store: JsonFileStore<typeof recipesDocumentSchema>
  private readonly now: () => Date

  constructor(options: RepositoryOptions) {
    this.store = new JsonFileStore(join(options.dataDir, RECIPES_FILE), recipesDocumentSchema, () => ({
      version: STORE_FORMAT_VERSION,
      recipes: [],
    }))
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Store a recipe. A recipe with the same id is replaced; a different recipe
   * with the same name is saved under a versioned name.
   */
  async save(recipe: Recipe): Promise<Recipe> {
    const valid = recipeSchema.parse(recipe)
    const saved = await this.store.update((document) => {
      const others = document.recipes.filter((r) => r.id !== valid.id)
      const stored: Recipe = {
        ...valid,
        name: versionedName(valid.name, new Set(others.map((r) => r.name)), this.now()),
        modifiedAt: this.now().toISOString(),
      }
      return { document: { ...document, recipes: [...others, stored] }, result: stored }
    })
    console.log(`[Persistence] Saved recipe "${saved.name}" (${saved.steps.length} steps)`)
    return saved
  }

  async list(): Promise<Recipe[]> {
    const document = await this.store.read()
    return [...document.recipes].sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt))
  }

  async load(id: string): Promise<Recipe | null> {
    const document = await this.store.read()
    return document.recipes.find((r) => r.id === id) ?? null
  }

  async delete(id: string): Promise<boolean> {
    return this.store.update((document) => {
      const recipes = document.recipes.filter((r) => r.id !== id)
      return { document: { ...document, recipes }, result: recipes.length !== document.recipes.length }
    })
  }
}
