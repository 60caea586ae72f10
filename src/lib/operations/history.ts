/**
 * Operation History
 *
 * Ordered entries plus a redo buffer. Entries are in application order; the
 * redo buffer holds undone operations, most recently undone first. Appending
 * branches the timeline and discards the redo buffer.
 */

import { HistoryError } from './errors'
import type { Operation } from './operation'
import type { OperationState } from './types'

export type HistoryResult =
  | { success: true; operation: Operation; previousState: OperationState }
  | { success: false; error: HistoryError }

export class OperationHistory {
  private readonly items: Operation[] = []
  private readonly redoStack: Operation[] = []

  get entries(): readonly Operation[] {
    return this.items
  }

  /** Head (index 0) is the most recently undone operation */
  get redoBuffer(): readonly Operation[] {
    return this.redoStack
  }

  get size(): number {
    return this.items.length
  }

  canUndo(): boolean {
    return this.items.length > 0
  }

  canRedo(): boolean {
    return this.redoStack.length > 0
  }

  append(operation: Operation): void {
    if (this.items.some((op) => op.id === operation.id)) {
      throw new Error(`Operation ${operation.id} is already in the history`)
    }
    this.items.push(operation)
    this.redoStack.length = 0
  }

  /**
   * Move the most recent entry, whatever its state, to the redo buffer.
   */
  undo(): HistoryResult {
    const operation = this.items.pop()
    if (!operation) {
      return { success: false, error: new HistoryError('NOTHING_TO_UNDO') }
    }
    const previousState = operation.state
    operation.markUndone()
    this.redoStack.unshift(operation)
    console.log(`[History] Undid "${operation.label}" (was ${previousState})`)
    return { success: true, operation, previousState }
  }

  /**
   * Re-append the most recently undone operation as queued.
   */
  redo(): HistoryResult {
    const operation = this.redoStack.shift()
    if (!operation) {
      return { success: false, error: new HistoryError('NOTHING_TO_REDO') }
    }
    const previousState = operation.state
    operation.markQueued()
    this.items.push(operation)
    console.log(`[History] Redid "${operation.label}"`)
    return { success: true, operation, previousState }
  }

  /** Entries that are not undone, in application order */
  activeEntries(): Operation[] {
    return this.items.filter((op) => op.state !== 'undone')
  }

  get(id: string): Operation | undefined {
    return this.items.find((op) => op.id === id)
  }

  indexOf(id: string): number {
    return this.items.findIndex((op) => op.id === id)
  }

  /**
   * Swap an entry in place, keeping its position. The redo buffer survives:
   * editing does not branch the timeline.
   */
  replace(id: string, operation: Operation): Operation {
    const index = this.indexOf(id)
    if (index === -1) {
      throw new Error(`Operation ${id} is not in the history`)
    }
    const previous = this.items[index]
    this.items[index] = operation
    return previous
  }

  /**
   * Drop an entry. Clears the redo buffer since the timeline has branched.
   */
  remove(id: string): Operation {
    const index = this.indexOf(id)
    if (index === -1) {
      throw new Error(`Operation ${id} is not in the history`)
    }
    const [removed] = this.items.splice(index, 1)
    this.redoStack.length = 0
    return removed
  }
}
