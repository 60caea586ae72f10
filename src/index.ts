/**
 * frameflow
 *
 * Recorded, replayable dataframe operations with undo/redo and lazy or eager
 * execution.
 */

export * from './types'
export * from './lib/frame'
export * from './lib/operations'
export * from './lib/export'
export { DatasetSession, toOperationView } from './lib/session/dataset-session'
export type { RestoredEntry } from './lib/session/dataset-session'
export * from './lib/session/types'
export * from './lib/session/errors'
export { createWorkspaceStore, WorkspaceLimitError } from './stores/workspaceStore'
export type { OpenDatasetOptions, OpenDatasetResult, OpenDatasetStatus, WorkspaceStore } from './stores/workspaceStore'
export { CsvParseError, datasetNameFromPath, inferColumnType, loadCsvFile, parseCsv, scanCsvFile } from './lib/loader/csv-loader'
export type { CsvOptions } from './lib/loader/csv-loader'
export { loadConfig, ConfigError } from './lib/config'
export type { AppConfig } from './lib/config'
export { StorageCorruptionError } from './lib/persistence/json-store'
export { AnalysisNotFoundError, AnalysisRepository } from './lib/persistence/analysis-repository'
export type { AnalysisSummary, AnalysisUpdate, SaveAnalysisInput } from './lib/persistence/analysis-repository'
export { RecipeRepository } from './lib/persistence/recipe-repository'
export { restoreSession, serializeOperations, toAnalysisInput } from './lib/persistence/analysis-session'
export type { RestoreOptions, RestoreResult } from './lib/persistence/analysis-session'
export type { Recipe, RecipeStep, RequiredColumn, SavedAnalysis, SavedOperation } from './lib/persistence/schemas'
export { applyRecipe, checkRecipe, previewRecipe, RecipeSchemaError } from './lib/recipe/recipe-executor'
export type { ApplyRecipeResult, RecipeExecutionProgress, RecipeStepError } from './lib/recipe/recipe-executor'
export { buildRecipe, extractRecipeSteps, extractRequiredColumns } from './lib/recipe/recipe-exporter'
export { matchColumns, validateRecipeSchema } from './lib/recipe/column-matcher'
export type { ColumnMapping, SchemaCheck } from './lib/recipe/column-matcher'
