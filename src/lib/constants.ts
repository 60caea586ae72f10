/**
 * Shared Constants
 *
 * Constants used across multiple modules to ensure consistent behavior.
 */

import type { ExecutionMode } from '@/types'

/**
 * Maximum number of datasets open in one workspace.
 */
export const MAX_DATASETS = 10

/**
 * Dataset counts at which the workspace starts warning that it is nearly full.
 *
 * Used by:
 * - workspaceStore.ts: addSession status (`warning_8`, `warning_9`)
 */
export const DATASET_WARNING_THRESHOLDS = [8, 9] as const

export const DEFAULT_EXECUTION_MODE: ExecutionMode = 'lazy'

/**
 * Suffix appended to right-side columns whose names collide on join.
 */
export const DEFAULT_JOIN_SUFFIX = '_right'

/**
 * Rows per page when a frame is sliced for display.
 */
export const PREVIEW_PAGE_SIZE = 500

/**
 * Directory under the user's home holding saved analyses and recipes,
 * unless FRAMEFLOW_HOME overrides it.
 */
export const DATA_DIR_NAME = '.frameflow'

export const ANALYSES_FILE = 'analyses.json'
export const RECIPES_FILE = 'recipes.json'

/**
 * On-disk format version of the JSON stores.
 */
export const STORE_FORMAT_VERSION = 1

/**
 * Rows per INSERT statement when a frame is loaded into DuckDB.
 */
export const INSERT_BATCH_SIZE = 500

/**
 * Executed entries between cached prefix frames. Undo and edits replay from
 * the nearest checkpoint instead of the base frame.
 */
export const CHECKPOINT_INTERVAL = 10
