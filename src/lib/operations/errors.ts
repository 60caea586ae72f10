import type { EngineErrorKind } from '@/lib/frame'
import type { ValidationIssue } from './types'

/**
 * Raised before an operation exists. A rejected spec never enters the history.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => issue.message).join('; '))
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/**
 * Execution failure attached to a failed operation.
 * `operationId` is null when the base frame itself could not be loaded.
 */
export class OperationError extends Error {
  readonly kind: EngineErrorKind
  readonly operationId: string | null

  constructor(kind: EngineErrorKind, message: string, operationId: string | null) {
    super(message)
    this.name = 'OperationError'
    this.kind = kind
    this.operationId = operationId
  }

  toJSON(): { kind: EngineErrorKind; message: string; operationId: string | null } {
    return { kind: this.kind, message: this.message, operationId: this.operationId }
  }
}

export type HistoryErrorCode = 'NOTHING_TO_UNDO' | 'NOTHING_TO_REDO'

export class HistoryError extends Error {
  readonly code: HistoryErrorCode

  constructor(code: HistoryErrorCode) {
    super(code === 'NOTHING_TO_UNDO' ? 'Nothing to undo' : 'Nothing to redo')
    this.name = 'HistoryError'
    this.code = code
  }
}
