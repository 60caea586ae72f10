export { exportSql } from './sql-export'
export type { SqlExportOptions } from './sql-export'
export { exportRecipe, importRecipe, RecipeFormatError } from './recipe-export'
