/**
 * Dataset Session
 *
 * Owns one loaded dataset: its immutable base frame, the materialized frame,
 * the operation history and the execution mode. Every user command goes
 * through here; recomputation runs as a background task.
 *
 * Concurrency model: single writer, non-reentrant. While a materialization
 * pass is in flight, commands that mutate the history are rejected with
 * SessionBusyError. The pass computes against a snapshot of the active
 * entries and commits frame, schema and operation states in one step.
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import type { ColumnInfo, DataFrame, DatasetHandle, ExecutionMode, FrameSource, Schema } from '@/types'
import { DEFAULT_EXECUTION_MODE } from '@/lib/constants'
import { collectFrame, createDuckDBEngine, getSchema, isLazyFrame } from '@/lib/frame'
import {
  createOperation,
  ExecutionEngine,
  ExecutionModeController,
  Operation,
  OperationError,
  OperationHistory,
  projectColumnsFor,
  type Checkpoint,
  type MaterializeRequest,
  type MaterializeResult,
  type OperationSpecInput,
  type OperationState,
} from '@/lib/operations'
import { generateId } from '@/lib/utils'
import { OperationNotFoundError, SessionBusyError, SessionClosedError } from './errors'
import type {
  DatasetSessionOptions,
  ExecuteQueuedOptions,
  MaterializationSummary,
  MaterializationTask,
  OperationView,
  SessionHistoryResult,
  SessionListener,
  SessionMessage,
  SessionSnapshot,
  SetModeOptions,
  SubmitResult,
} from './types'

type PassOptions = Pick<MaterializeRequest, 'rebuild' | 'executeQueued' | 'haltOnFailure' | 'shouldRun' | 'invalidated'>

export interface RestoredEntry {
  spec: OperationSpecInput
  state: Exclude<OperationState, 'undone'>
}

export class DatasetSession {
  readonly id: string
  readonly name: string
  readonly sourcePath: string | null
  readonly history = new OperationHistory()
  readonly store: StoreApi<SessionSnapshot>

  private readonly base: FrameSource
  private readonly modeController: ExecutionModeController
  private readonly engine: ExecutionEngine
  private readonly resolveDataset: (datasetId: string) => DatasetHandle | undefined
  private readonly listeners = new Set<SessionListener>()

  private materialized: DataFrame | null
  /** Entries left queued by a deferred submission; eager passes stop in front of them */
  private readonly deferred = new Set<string>()
  /** Frames after runs of executed entries at the head of the history */
  private checkpoints: Checkpoint[] = []
  private lastFailure: OperationError | null = null
  private sequence = 0
  private inFlight: { task: MaterializationTask; controller: AbortController } | null = null
  private closed = false

  constructor(options: DatasetSessionOptions) {
    this.id = options.id ?? generateId()
    this.name = options.name
    this.sourcePath = options.sourcePath ?? null
    this.base = options.base
    this.materialized = isLazyFrame(options.base) ? null : options.base
    this.modeController = new ExecutionModeController(options.mode ?? DEFAULT_EXECUTION_MODE)
    this.resolveDataset = options.resolveDataset ?? (() => undefined)
    this.engine = new ExecutionEngine({
      engine: options.engine ?? createDuckDBEngine(),
      resolveDataset: (datasetId) => this.resolveDataset(datasetId),
    })
    this.store = createStore<SessionSnapshot>()(() => this.buildSnapshot())
  }

  // ===== READ ACCESS =====

  get baseFrame(): FrameSource {
    return this.base
  }

  /** Materialized frame; null until a lazy base has been collected */
  get frame(): DataFrame | null {
    return this.materialized
  }

  get columns(): ColumnInfo[] {
    return this.materialized?.columns ?? this.base.columns
  }

  get schema(): Schema {
    return getSchema(this.columns)
  }

  get mode(): ExecutionMode {
    return this.modeController.mode
  }

  get isBusy(): boolean {
    return this.inFlight !== null
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Next value of the per-session operation sequence */
  get nextSequence(): number {
    return this.sequence + 1
  }

  /**
   * View of this dataset for other sessions' joins
   */
  toHandle(): DatasetHandle {
    return {
      id: this.id,
      name: this.name,
      columns: this.columns,
      collect: async () => this.materialized ?? (await collectFrame(this.base)),
    }
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ===== COMMANDS =====

  /**
   * Validate and record an operation. In eager mode it starts executing
   * immediately, unless entries queued earlier are still waiting; in lazy
   * mode it stays queued.
   *
   * @throws ValidationError when the spec does not fit the projected schema
   */
  submitOperation(spec: OperationSpecInput): SubmitResult {
    this.assertWritable()

    const operation = createOperation(spec, {
      createdAtSeq: this.sequence + 1,
      columns: this.projectedColumns(),
      resolveDataset: this.resolveDataset,
    })
    this.sequence = operation.createdAtSeq
    this.history.append(operation)
    console.log(`[Session] ${this.name}: recorded "${operation.label}" (${this.mode})`)

    this.publishHistory()
    this.emitOperationState(operation)

    return { operation, task: this.runOrDefer(operation) }
  }

  undo(): SessionHistoryResult {
    this.assertWritable()

    const result = this.history.undo()
    if (!result.success) {
      return { ...result, task: null }
    }

    if (this.lastFailure?.operationId === result.operation.id) {
      this.lastFailure = null
    }
    this.deferred.delete(result.operation.id)
    this.publishHistory()
    this.emitOperationState(result.operation)

    // Only executed entries contributed to the frame
    const task =
      result.previousState === 'executed' ? this.startMaterialization({ rebuild: true, executeQueued: false }) : null
    return { ...result, task }
  }

  redo(): SessionHistoryResult {
    this.assertWritable()

    const result = this.history.redo()
    if (!result.success) {
      return { ...result, task: null }
    }

    this.publishHistory()
    this.emitOperationState(result.operation)

    return { ...result, task: this.runOrDefer(result.operation) }
  }

  /**
   * Switch execution mode. Existing entries keep their states unless `queued`
   * says otherwise: 'execute' runs them now, 'clear' drops them.
   *
   * @returns the pass started by `queued: 'execute'`, if any
   */
  setMode(mode: ExecutionMode, options: SetModeOptions = {}): MaterializationTask | null {
    const queued = options.queued ?? 'keep'
    if (queued === 'keep') {
      this.assertOpen()
    } else {
      this.assertWritable()
    }

    const { previous } = this.modeController.setMode(mode)
    if (previous !== mode) {
      console.log(`[Session] ${this.name}: execution mode ${previous} -> ${mode}`)
      this.store.setState({ mode })
      this.emit({ type: 'mode_changed', sessionId: this.id, mode })
    }

    if (queued === 'clear') {
      this.clearQueued()
      return null
    }
    return queued === 'execute' ? this.executeQueued() : null
  }

  /**
   * Drop every queued entry from the history. Executed and failed entries,
   * and the frame, are untouched. Clears the redo buffer.
   *
   * @returns the removed operations, in history order
   */
  clearQueued(): Operation[] {
    this.assertWritable()

    const queued = this.history.activeEntries().filter((op) => op.state === 'queued')
    if (queued.length === 0) {
      return []
    }
    for (const op of queued) {
      this.history.remove(op.id)
      this.deferred.delete(op.id)
    }
    console.log(`[Session] ${this.name}: cleared ${queued.length} queued operations`)
    this.publishHistory()
    return queued
  }

  /**
   * Run queued (and previously failed) entries, in order.
   *
   * @returns null when nothing is pending
   */
  executeQueued(options: ExecuteQueuedOptions = {}): MaterializationTask | null {
    this.assertWritable()

    const pending = this.history.activeEntries().filter((op) => op.state === 'queued' || op.state === 'failed')
    if (pending.length === 0) {
      return null
    }

    let shouldRun: ((op: Operation) => boolean) | undefined
    if (options.operationId !== undefined) {
      const target = pending.findIndex((op) => op.id === options.operationId)
      if (target === -1) {
        throw new OperationNotFoundError(options.operationId)
      }
      const allowed = new Set(pending.slice(0, target + 1).map((op) => op.id))
      shouldRun = (op) => allowed.has(op.id)
    }

    return this.startMaterialization({
      executeQueued: true,
      haltOnFailure: !options.skipFailed,
      shouldRun,
    })
  }

  /**
   * Run only the earliest pending entry
   */
  executeNext(): MaterializationTask | null {
    const next = this.history.activeEntries().find((op) => op.state === 'queued' || op.state === 'failed')
    return next ? this.executeQueued({ operationId: next.id }) : null
  }

  /**
   * Replace an entry's params in place. The entry keeps its id and position and
   * returns to queued; executed entries after it lose their effect and are
   * recomputed (eager) or queued again (lazy).
   *
   * @throws ValidationError when the new spec does not fit the columns at that position
   */
  editOperation(operationId: string, spec: OperationSpecInput): SubmitResult {
    this.assertWritable()

    const index = this.history.indexOf(operationId)
    if (index === -1) {
      throw new OperationNotFoundError(operationId)
    }
    const entries = this.history.entries
    const current = entries[index]

    const operation = createOperation(spec, {
      id: current.id,
      createdAtSeq: current.createdAtSeq,
      columns: this.projectColumnsThrough(entries.slice(0, index)),
      resolveDataset: this.resolveDataset,
    })
    this.history.replace(operationId, operation)
    this.checkpoints = this.checkpoints.filter((checkpoint) => !checkpoint.ids.includes(operationId))
    console.log(`[Session] ${this.name}: edited "${current.label}" -> "${operation.label}"`)

    const invalidated = new Set(
      entries
        .slice(index + 1)
        .filter((op) => op.state === 'executed')
        .map((op) => op.id)
    )

    this.publishHistory()
    this.emitOperationState(operation)

    const eager = this.mode === 'eager'
    if (!eager) {
      this.deferred.add(operation.id)
      for (const id of invalidated) this.deferred.add(id)
    }
    const needsRebuild = current.state === 'executed' || invalidated.size > 0
    if (!needsRebuild && !eager) {
      return { operation, task: null }
    }
    const task = this.startMaterialization({
      rebuild: needsRebuild,
      invalidated,
      executeQueued: eager,
      shouldRun: this.aheadOfDeferred(),
    })
    return { operation, task }
  }

  /**
   * Drop an entry from the history. Clears the redo buffer.
   */
  removeOperation(operationId: string): SubmitResult {
    this.assertWritable()

    if (this.history.indexOf(operationId) === -1) {
      throw new OperationNotFoundError(operationId)
    }
    const removed = this.history.remove(operationId)
    this.deferred.delete(removed.id)
    console.log(`[Session] ${this.name}: removed "${removed.label}"`)
    this.publishHistory()

    const eager = this.mode === 'eager'
    const needsRebuild = removed.state === 'executed'
    const task =
      needsRebuild || eager
        ? this.startMaterialization({ rebuild: needsRebuild, executeQueued: eager, shouldRun: this.aheadOfDeferred() })
        : null
    return { operation: removed, task }
  }

  /**
   * Recompute the frame from the base using the executed entries only.
   * Also collects a lazy base for the first time.
   */
  materialize(): MaterializationTask {
    this.assertWritable()
    this.checkpoints = []
    return this.startMaterialization({ rebuild: true, executeQueued: false })
  }

  /**
   * Re-record saved entries and bring each back to its saved state: executed
   * and failed entries run again, queued ones stay queued. Failures do not
   * halt the replay, so later executed entries come back executed.
   *
   * @throws ValidationError when a saved entry no longer validates
   */
  restoreHistory(saved: RestoredEntry[]): MaterializationTask | null {
    this.assertWritable()

    const toRun = new Set<string>()
    for (const entry of saved) {
      const operation = createOperation(entry.spec, {
        createdAtSeq: this.sequence + 1,
        columns: this.projectedColumns(),
        resolveDataset: this.resolveDataset,
      })
      this.sequence = operation.createdAtSeq
      this.history.append(operation)
      if (entry.state === 'queued') {
        this.deferred.add(operation.id)
      } else {
        toRun.add(operation.id)
      }
    }
    console.log(`[Session] ${this.name}: restored ${saved.length} operations`)
    this.publishHistory()

    if (toRun.size === 0) {
      return null
    }
    return this.startMaterialization({
      executeQueued: true,
      haltOnFailure: false,
      shouldRun: (op) => toRun.has(op.id),
    })
  }

  /**
   * Request cancellation of the in-flight pass. Takes effect between operations.
   */
  cancel(): boolean {
    if (!this.inFlight) return false
    this.inFlight.task.cancel()
    return true
  }

  close(): void {
    if (this.closed) return
    this.cancel()
    this.closed = true
    this.listeners.clear()
    console.log(`[Session] ${this.name}: closed`)
  }

  // ===== MATERIALIZATION =====

  private startMaterialization(options: PassOptions): MaterializationTask {
    const controller = new AbortController()
    const taskId = generateId()

    this.store.setState({ isMaterializing: true })

    const promise = this.engine
      .materialize({
        ...options,
        base: this.base,
        entries: this.history.activeEntries(),
        cached: this.materialized,
        checkpoints: this.checkpoints,
        signal: controller.signal,
      })
      .then(
        (result) => this.commit(taskId, result),
        (error: unknown) => this.abandon(taskId, error)
      )

    const task: MaterializationTask = {
      id: taskId,
      promise,
      cancel: () => controller.abort(),
    }
    this.inFlight = { task, controller }
    return task
  }

  /**
   * Apply a finished pass: states, frame and schema change together, then
   * subscribers are told.
   */
  private commit(taskId: string, result: MaterializeResult): MaterializationSummary {
    this.inFlight = null
    const status = result.cancelled ? 'cancelled' : result.firstFailure ? 'failed' : 'completed'
    const summary: MaterializationSummary = {
      taskId,
      status,
      outcomes: result.outcomes,
      firstFailure: result.firstFailure,
    }
    if (this.closed) {
      return { ...summary, status: 'cancelled' }
    }

    const byId = new Map(this.history.entries.map((op) => [op.id, op]))
    const changed: Operation[] = []

    for (const outcome of result.outcomes) {
      const op = byId.get(outcome.operationId)
      if (!op) continue
      const before = op.state

      switch (outcome.status) {
        case 'executed':
          if (op.state !== 'executed') op.markExecuted()
          this.deferred.delete(op.id)
          break
        case 'failed':
          this.deferred.delete(op.id)
          // A replayed entry that fails now has left the frame
          if (op.state === 'executed') op.markQueued()
          op.markFailed(outcome.error ?? new OperationError('ENGINE_INTERNAL', 'Operation failed', op.id))
          break
        case 'pending':
          if (op.state === 'executed') op.markQueued()
          break
        case 'cached':
        case 'skipped':
        case 'cancelled':
          break
      }

      if (op.state !== before || outcome.status === 'failed') {
        changed.push(op)
      }
    }

    this.materialized = result.frame
    this.checkpoints = this.liveCheckpoints([...this.checkpoints, ...result.checkpoints])
    if (result.firstFailure || !result.cancelled) {
      this.lastFailure = result.firstFailure
    }
    this.store.setState(this.buildSnapshot())

    for (const op of changed) {
      this.emitOperationState(op)
    }
    this.emit({ type: 'materialized', sessionId: this.id, frame: result.frame, schema: this.schema })
    if (result.firstFailure) {
      this.emit({ type: 'materialization_failed', sessionId: this.id, error: result.firstFailure })
    }
    if (result.cancelled) {
      this.emit({ type: 'materialization_cancelled', sessionId: this.id, taskId })
    }

    console.log(
      `[Session] ${this.name}: ${status} (${result.frame.rows.length} rows, ${result.frame.columns.length} columns)`
    )
    return summary
  }

  /**
   * The engine reports failures as results; reaching this means a bug below.
   * Keep the previous frame and surface the error instead of rejecting.
   */
  private abandon(taskId: string, error: unknown): MaterializationSummary {
    this.inFlight = null
    console.error(`[Session] ${this.name}: materialization crashed`, error)
    const message = error instanceof Error ? error.message : String(error)
    const failure = new OperationError('ENGINE_INTERNAL', message, null)
    this.lastFailure = failure
    if (!this.closed) {
      this.store.setState(this.buildSnapshot())
      this.emit({ type: 'materialization_failed', sessionId: this.id, error: failure })
    }
    return { taskId, status: 'failed', outcomes: [], firstFailure: failure }
  }

  // ===== HELPERS =====

  /**
   * Start an eager pass for a newly appended entry, or leave it queued
   * behind entries that are still waiting for an explicit execute.
   */
  private runOrDefer(operation: Operation): MaterializationTask | null {
    const deferredAhead = this.history
      .activeEntries()
      .some((op) => op.id !== operation.id && op.state === 'queued' && this.deferred.has(op.id))

    if (this.modeController.decide({ deferredAhead }) === 'defer') {
      this.deferred.add(operation.id)
      return null
    }
    return this.startMaterialization({ executeQueued: true })
  }

  /**
   * Checkpoints still describing the executed head of the history, one per
   * length, newest first
   */
  private liveCheckpoints(candidates: Checkpoint[]): Checkpoint[] {
    const active = this.history.activeEntries()
    const byLength = new Map<number, Checkpoint>()
    for (const checkpoint of candidates) {
      const live =
        checkpoint.ids.length <= active.length &&
        checkpoint.ids.every((id, i) => active[i].id === id && active[i].state === 'executed')
      if (live) byLength.set(checkpoint.ids.length, checkpoint)
    }
    return [...byLength.values()].sort((a, b) => b.ids.length - a.ids.length)
  }

  /** Entries before the first deferred queued one; an eager pass runs no further */
  private aheadOfDeferred(): (op: Operation) => boolean {
    const allowed = new Set<string>()
    for (const op of this.history.activeEntries()) {
      if (op.state === 'queued' && this.deferred.has(op.id)) break
      allowed.add(op.id)
    }
    return (op) => allowed.has(op.id)
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionClosedError(this.name)
    }
  }

  private assertWritable(): void {
    this.assertOpen()
    if (this.inFlight) {
      throw new SessionBusyError(this.name)
    }
  }

  /**
   * Columns a newly appended operation will see: the materialized columns
   * carried through every queued entry.
   */
  private projectedColumns(): ColumnInfo[] | null {
    let columns: ColumnInfo[] | null = this.columns
    for (const op of this.history.activeEntries()) {
      if (op.state !== 'queued') continue
      columns = projectColumnsFor(op.spec, { columns, resolveDataset: this.resolveDataset })
    }
    return columns
  }

  /**
   * Columns after the given entries, projected from the base. Failed entries
   * contribute nothing.
   */
  private projectColumnsThrough(entries: readonly Operation[]): ColumnInfo[] | null {
    let columns: ColumnInfo[] | null = this.base.columns
    for (const op of entries) {
      if (op.state === 'failed' || op.state === 'undone') continue
      columns = projectColumnsFor(op.spec, { columns, resolveDataset: this.resolveDataset })
    }
    return columns
  }

  private buildSnapshot(): SessionSnapshot {
    const columns = this.columns
    return {
      sessionId: this.id,
      name: this.name,
      mode: this.modeController.mode,
      frame: this.materialized,
      columns,
      schema: getSchema(columns),
      operations: this.history.entries.map(toOperationView),
      redoCount: this.history.redoBuffer.length,
      canUndo: this.history.canUndo(),
      canRedo: this.history.canRedo(),
      isMaterializing: this.inFlight !== null,
      lastFailure: this.lastFailure,
    }
  }

  private publishHistory(): void {
    const snapshot = this.buildSnapshot()
    this.store.setState(snapshot)
    this.emit({ type: 'history_changed', sessionId: this.id, operations: snapshot.operations })
  }

  private emitOperationState(op: Operation): void {
    this.emit({
      type: 'operation_state',
      sessionId: this.id,
      operationId: op.id,
      label: op.label,
      state: op.state,
      error: op.error,
    })
  }

  private emit(message: SessionMessage): void {
    for (const listener of this.listeners) {
      try {
        listener(message)
      } catch (error) {
        console.error(`[Session] ${this.name}: listener failed on ${message.type}`, error)
      }
    }
  }
}

export function toOperationView(op: Operation): OperationView {
  return {
    id: op.id,
    kind: op.kind,
    label: op.label,
    state: op.state,
    createdAtSeq: op.createdAtSeq,
    error: op.error ? { kind: op.error.kind, message: op.error.message } : null,
  }
}
