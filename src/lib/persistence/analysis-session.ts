/**
 * Analysis <-> Session
 *
 * Turns a session's history into a saved analysis and back. Operations are
 * stored as kind + params only; restoring rebuilds each one through the
 * registry and replays it so states and frame match the moment of saving.
 */

import type { FrameSource } from '@/types'
import { loadCsvFile, datasetNameFromPath } from '@/lib/loader/csv-loader'
import { parseOperationSpec, type Operation } from '@/lib/operations'
import type { DatasetSession } from '@/lib/session/dataset-session'
import type { MaterializationSummary, MaterializationTask } from '@/lib/session/types'
import { WorkspaceLimitError, type WorkspaceStore } from '@/stores/workspaceStore'
import type { SaveAnalysisInput } from './analysis-repository'
import type { SavedAnalysis, SavedOperation } from './schemas'

/**
 * Active entries in application order. Undone entries are left out.
 */
export function serializeOperations(entries: readonly Operation[]): SavedOperation[] {
  const saved: SavedOperation[] = []
  for (const op of entries) {
    const state = op.state
    if (state === 'undone') continue
    saved.push({ ...op.spec, label: op.label, state })
  }
  return saved
}

export function toAnalysisInput(
  session: DatasetSession,
  details: { name: string; description?: string | null }
): SaveAnalysisInput {
  return {
    name: details.name,
    description: details.description ?? null,
    datasetPath: session.sourcePath,
    executionMode: session.mode,
    operations: serializeOperations(session.history.entries),
  }
}

export interface RestoreOptions {
  workspace: WorkspaceStore
  /** Frame to restore onto; loaded from the analysis' dataset path when omitted */
  base?: FrameSource
}

export interface RestoreResult {
  session: DatasetSession
  /** Null when nothing needed to run */
  summary: MaterializationSummary | null
}

/**
 * Open the analysis' dataset as a new session and replay its operations.
 *
 * @throws WorkspaceLimitError when no dataset slot is free
 * @throws ValidationError when a saved operation no longer fits the data
 */
export async function restoreSession(analysis: SavedAnalysis, options: RestoreOptions): Promise<RestoreResult> {
  let base = options.base
  if (!base) {
    if (analysis.datasetPath === null) {
      throw new Error(`Analysis "${analysis.name}" has no dataset path; pass a base frame`)
    }
    base = await loadCsvFile(analysis.datasetPath)
  }

  const opened = options.workspace.getState().openDataset({
    name: analysis.datasetPath ? datasetNameFromPath(analysis.datasetPath) : analysis.name,
    base,
    sourcePath: analysis.datasetPath,
    mode: analysis.executionMode,
  })
  if (opened.status === 'error_limit') {
    throw new WorkspaceLimitError()
  }
  const session = opened.session

  let task: MaterializationTask | null
  try {
    task = session.restoreHistory(
      analysis.operations.map((op) => ({
        spec: parseOperationSpec({ kind: op.kind, params: op.params }),
        state: op.state,
      }))
    )
  } catch (error) {
    options.workspace.getState().removeSession(session.id)
    throw error
  }

  const summary = task ? await task.promise : null
  console.log(`[Persistence] Restored analysis "${analysis.name}" into "${session.name}"`)
  return { session, summary }
}
