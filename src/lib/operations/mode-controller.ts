import type { ExecutionMode } from '@/types'

export type ExecutionDecision = 'run_now' | 'defer'

export interface DecisionContext {
  /** An earlier entry is still queued from a deferred submission */
  deferredAhead: boolean
}

/**
 * Whether a newly appended (or redone) operation runs immediately. An eager
 * session never runs past entries that were left queued, so the new entry
 * waits behind them.
 */
export function decide(mode: ExecutionMode, context: DecisionContext = { deferredAhead: false }): ExecutionDecision {
  return mode === 'eager' && !context.deferredAhead ? 'run_now' : 'defer'
}

/**
 * Holds the session's execution mode. Switching modes never touches
 * existing entries: queued operations stay queued until executed explicitly.
 */
export class ExecutionModeController {
  private current: ExecutionMode

  constructor(mode: ExecutionMode) {
    this.current = mode
  }

  get mode(): ExecutionMode {
    return this.current
  }

  setMode(mode: ExecutionMode): { previous: ExecutionMode; current: ExecutionMode } {
    const previous = this.current
    this.current = mode
    return { previous, current: mode }
  }

  decide(context?: DecisionContext): ExecutionDecision {
    return decide(this.current, context)
  }
}
