/**
 * Execution Engine
 *
 * Folds active operations over a base frame. Pure with respect to the
 * history: it reports an outcome per operation and the resulting frame, and
 * the session commits both together.
 *
 * Rules:
 * - Executed entries are already folded into `cached`; they are replayed only
 *   when the pass starts from the base frame.
 * - Queued and failed entries run when `executeQueued` is set (and
 *   `shouldRun` agrees). Failed entries are retried in order.
 * - The first failure halts the pass unless `haltOnFailure` is false. Later
 *   executed entries are reported `pending`: they are no longer in the frame.
 * - Cancellation is observed between operations, never inside one.
 * - A pass that has to start from the base resumes from the longest
 *   checkpoint whose entries are still the executed head of the history.
 *   Every CHECKPOINT_INTERVAL applied entries of that head, a new checkpoint
 *   is taken.
 */

import type { DataFrame, FrameSource } from '@/types'
import { CHECKPOINT_INTERVAL } from '@/lib/constants'
import { collectFrame, createFrame, fail, type EngineResult } from '@/lib/frame'
import { yieldToEventLoop } from '@/lib/utils/yield-to-event-loop'
import { OperationError } from './errors'
import type { Operation } from './operation'
import type { OperationContext } from './types'

export type OutcomeStatus = 'executed' | 'failed' | 'cached' | 'skipped' | 'pending' | 'cancelled'

export interface OperationOutcome {
  operationId: string
  status: OutcomeStatus
  error: OperationError | null
}

/**
 * Frame after a run of executed entries at the head of the history
 */
export interface Checkpoint {
  ids: readonly string[]
  frame: DataFrame
}

export interface MaterializeProgress {
  completed: number
  total: number
  operationId: string
}

export interface MaterializeRequest {
  base: FrameSource
  entries: readonly Operation[]
  /** Frame currently holding the executed entries */
  cached?: DataFrame | null
  /** Start from the base frame and replay executed entries */
  rebuild?: boolean
  executeQueued?: boolean
  haltOnFailure?: boolean
  /** Restricts which queued/failed entries run */
  shouldRun?: (operation: Operation) => boolean
  /** Executed entries whose effect must be recomputed (edited or after an edit) */
  invalidated?: ReadonlySet<string>
  checkpoints?: readonly Checkpoint[]
  signal?: AbortSignal
  onProgress?: (progress: MaterializeProgress) => void
}

export interface MaterializeResult {
  frame: DataFrame
  outcomes: OperationOutcome[]
  firstFailure: OperationError | null
  cancelled: boolean
  rebuilt: boolean
  /** Entries restored from a checkpoint instead of replayed */
  resumed: number
  /** Checkpoints taken during this pass */
  checkpoints: Checkpoint[]
}

export class ExecutionEngine {
  private readonly ctx: OperationContext

  constructor(ctx: OperationContext) {
    this.ctx = ctx
  }

  async materialize(request: MaterializeRequest): Promise<MaterializeResult> {
    const executeQueued = request.executeQueued ?? true
    const haltOnFailure = request.haltOnFailure ?? true
    const invalidated = request.invalidated ?? new Set<string>()
    const active = request.entries.filter((op) => op.state !== 'undone')

    const isReplay = (op: Operation) => op.state === 'executed' && !invalidated.has(op.id)
    const isPending = (op: Operation) => op.state === 'queued' || op.state === 'failed' || invalidated.has(op.id)
    const wantsRun = (op: Operation) => executeQueued && isPending(op) && (request.shouldRun?.(op) ?? true)

    const cached = request.rebuild || invalidated.size > 0 ? null : (request.cached ?? null)
    const fromBase = cached === null || this.runsBeforeExecuted(active, wantsRun, isReplay)

    const checkpoint = fromBase ? this.findCheckpoint(active, request.checkpoints ?? [], isReplay) : null
    const resumed = checkpoint?.ids.length ?? 0

    const toRun = active.slice(resumed).filter((op) => wantsRun(op) || (fromBase && isReplay(op))).length
    console.log(
      `[Engine] Materializing ${toRun} of ${active.length} operations${
        checkpoint ? ` from checkpoint after ${resumed}` : fromBase ? ' from base frame' : ''
      }`
    )

    let frame: DataFrame
    if (checkpoint) {
      frame = checkpoint.frame
    } else if (!fromBase && cached !== null) {
      frame = cached
    } else {
      try {
        frame = await collectFrame(request.base)
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        console.error('[Engine] Failed to load base frame:', error)
        return {
          frame: request.cached ?? createFrame(request.base.columns, []),
          outcomes: active.map((op) => ({ operationId: op.id, status: 'skipped', error: null })),
          firstFailure: new OperationError('ENGINE_INTERNAL', `Failed to load base frame: ${message}`, null),
          cancelled: false,
          rebuilt: false,
          resumed: 0,
          checkpoints: [],
        }
      }
    }

    const outcomes: OperationOutcome[] = []
    let firstFailure: OperationError | null = null
    let stopped = false
    let cancelled = false
    let completed = 0
    // Ids of the unbroken executed head; null once something else appears
    let head: string[] | null = []
    const taken: Checkpoint[] = []

    for (const [position, op] of active.entries()) {
      if (position < resumed) {
        head?.push(op.id)
        outcomes.push(this.outcome(op, 'cached'))
        continue
      }

      if (stopped) {
        outcomes.push(this.outcome(op, op.state === 'executed' ? 'pending' : cancelled ? 'cancelled' : 'skipped'))
        continue
      }

      if (isReplay(op) && !fromBase) {
        head?.push(op.id)
        outcomes.push(this.outcome(op, 'cached'))
        continue
      }

      if (!isReplay(op) && !wantsRun(op)) {
        head = null
        outcomes.push(this.outcome(op, op.state === 'executed' ? 'pending' : 'skipped'))
        continue
      }

      await yieldToEventLoop()
      if (request.signal?.aborted) {
        console.log(`[Engine] Cancelled before "${op.label}"`)
        head = null
        cancelled = true
        stopped = true
        outcomes.push(this.outcome(op, op.state === 'executed' ? 'pending' : 'cancelled'))
        continue
      }

      const result = await this.applySafely(op, frame)
      completed++
      request.onProgress?.({ completed, total: toRun, operationId: op.id })

      if (result.ok) {
        frame = result.frame
        outcomes.push(this.outcome(op, 'executed'))
        if (head) {
          head.push(op.id)
          if (head.length % CHECKPOINT_INTERVAL === 0) {
            taken.push({ ids: [...head], frame })
          }
        }
        continue
      }

      head = null
      const error = new OperationError(result.error.kind, result.error.message, op.id)
      console.warn(`[Engine] "${op.label}" failed (${error.kind}): ${error.message}`)
      outcomes.push({ operationId: op.id, status: 'failed', error })
      firstFailure ??= error
      if (haltOnFailure) {
        stopped = true
      }
    }

    if (taken.length > 0) {
      console.log(`[Engine] Took ${taken.length} checkpoint(s)`)
    }
    return { frame, outcomes, firstFailure, cancelled, rebuilt: fromBase, resumed, checkpoints: taken }
  }

  /**
   * Longest checkpoint whose entries are, in order, the head of `active` and
   * still executed with their recorded effect.
   */
  private findCheckpoint(
    active: Operation[],
    checkpoints: readonly Checkpoint[],
    isReplay: (op: Operation) => boolean
  ): Checkpoint | null {
    let best: Checkpoint | null = null
    for (const checkpoint of checkpoints) {
      if (checkpoint.ids.length > active.length) continue
      if (best && best.ids.length >= checkpoint.ids.length) continue
      const matches = checkpoint.ids.every((id, i) => active[i].id === id && isReplay(active[i]))
      if (matches) best = checkpoint
    }
    return best
  }

  /**
   * A queued entry that must run ahead of an executed one cannot be applied
   * on top of the cached frame; the pass has to start from the base.
   */
  private runsBeforeExecuted(
    active: Operation[],
    wantsRun: (op: Operation) => boolean,
    isReplay: (op: Operation) => boolean
  ): boolean {
    let sawRunnable = false
    for (const op of active) {
      if (wantsRun(op)) {
        sawRunnable = true
      } else if (sawRunnable && isReplay(op)) {
        return true
      }
    }
    return false
  }

  private async applySafely(op: Operation, frame: DataFrame): Promise<EngineResult> {
    try {
      return await op.apply(frame, this.ctx)
    } catch (error) {
      console.error(`[Engine] Unexpected error in "${op.label}":`, error)
      const message = error instanceof Error ? error.message : String(error)
      return fail('ENGINE_INTERNAL', message)
    }
  }

  private outcome(op: Operation, status: OutcomeStatus): OperationOutcome {
    return { operationId: op.id, status, error: null }
  }
}
