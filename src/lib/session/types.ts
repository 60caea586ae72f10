import type { ColumnInfo, DataFrame, DatasetHandle, ExecutionMode, FrameSource, Schema } from '@/types'
import type { DataFrameEngine } from '@/lib/frame'
import type {
  HistoryResult,
  Operation,
  OperationError,
  OperationKind,
  OperationOutcome,
  OperationState,
} from '@/lib/operations'

export interface DatasetSessionOptions {
  id?: string
  name: string
  base: FrameSource
  /** File the base frame was loaded from, when there is one */
  sourcePath?: string | null
  mode?: ExecutionMode
  engine?: DataFrameEngine
  /** Lookup for other loaded datasets (join right sides) */
  resolveDataset?: (datasetId: string) => DatasetHandle | undefined
}

// ===== TASKS =====

export type MaterializationStatus = 'completed' | 'failed' | 'cancelled'

export interface MaterializationSummary {
  taskId: string
  status: MaterializationStatus
  outcomes: OperationOutcome[]
  firstFailure: OperationError | null
}

/**
 * Handle to a background materialization pass
 */
export interface MaterializationTask {
  readonly id: string
  readonly promise: Promise<MaterializationSummary>
  cancel(): void
}

export interface SubmitResult {
  operation: Operation
  task: MaterializationTask | null
}

export type SessionHistoryResult = HistoryResult & { task: MaterializationTask | null }

export interface ExecuteQueuedOptions {
  /** Run pending entries up to and including this one; all of them when omitted */
  operationId?: string
  /** Keep going past failures instead of halting at the first one */
  skipFailed?: boolean
}

export interface SetModeOptions {
  /** What happens to entries already queued: kept (default), executed now, or cleared */
  queued?: 'keep' | 'execute' | 'clear'
}

// ===== OBSERVABLE STATE =====

export interface OperationView {
  id: string
  kind: OperationKind
  label: string
  state: OperationState
  createdAtSeq: number
  error: { kind: string; message: string } | null
}

export interface SessionSnapshot {
  sessionId: string
  name: string
  mode: ExecutionMode
  frame: DataFrame | null
  columns: ColumnInfo[]
  schema: Schema
  operations: OperationView[]
  redoCount: number
  canUndo: boolean
  canRedo: boolean
  isMaterializing: boolean
  lastFailure: OperationError | null
}

// ===== MESSAGES =====

export type SessionMessage =
  | { type: 'materialized'; sessionId: string; frame: DataFrame; schema: Schema }
  | {
      type: 'operation_state'
      sessionId: string
      operationId: string
      label: string
      state: OperationState
      error: OperationError | null
    }
  | { type: 'materialization_failed'; sessionId: string; error: OperationError }
  | { type: 'materialization_cancelled'; sessionId: string; taskId: string }
  | { type: 'history_changed'; sessionId: string; operations: OperationView[] }
  | { type: 'mode_changed'; sessionId: string; mode: ExecutionMode }

export type SessionListener = (message: SessionMessage) => void
