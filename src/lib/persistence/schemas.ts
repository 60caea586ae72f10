import { z } from 'zod'
import { operationSpecSchema } from '@/lib/operations'
import { STORE_FORMAT_VERSION } from '@/lib/constants'

/**
 * A saved operation: kind + params plus the display label and the state it
 * had when saved. Undone entries are never saved.
 */
export const savedOperationSchema = z.intersection(
  operationSpecSchema,
  z.object({
    label: z.string(),
    state: z.enum(['queued', 'executed', 'failed']),
  })
)

export const savedAnalysisSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string().nullable(),
  createdAt: z.string().datetime(),
  modifiedAt: z.string().datetime(),
  operationCount: z.number().int().nonnegative(),
  datasetPath: z.string().nullable(),
  executionMode: z.enum(['lazy', 'eager']),
  operations: z.array(savedOperationSchema),
})

export const analysesDocumentSchema = z.object({
  version: z.literal(STORE_FORMAT_VERSION),
  nextId: z.number().int().positive(),
  analyses: z.array(savedAnalysisSchema),
})

export const recipeStepSchema = z.intersection(
  operationSpecSchema,
  z.object({
    label: z.string(),
  })
)

export const requiredColumnSchema = z.object({
  name: z.string().min(1),
  category: z.enum(['numeric', 'text', 'date', 'boolean', 'unknown']),
})

export const recipeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().nullable(),
  createdAt: z.string().datetime(),
  modifiedAt: z.string().datetime(),
  requiredColumns: z.array(requiredColumnSchema),
  steps: z.array(recipeStepSchema),
})

export const recipesDocumentSchema = z.object({
  version: z.literal(STORE_FORMAT_VERSION),
  recipes: z.array(recipeSchema),
})

export type SavedOperation = z.infer<typeof savedOperationSchema>
export type SavedAnalysis = z.infer<typeof savedAnalysisSchema>
export type AnalysesDocument = z.infer<typeof analysesDocumentSchema>
export type RecipeStep = z.infer<typeof recipeStepSchema>
export type RequiredColumn = z.infer<typeof requiredColumnSchema>
export type Recipe = z.infer<typeof recipeSchema>
export type RecipesDocument = z.infer<typeof recipesDocumentSchema>
