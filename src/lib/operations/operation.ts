/**
 * Operation
 *
 * One recorded transformation: immutable kind + params, a derived label and a
 * mutable lifecycle state. The transform is looked up from the registry on
 * every apply, so an operation is fully described by its serialized form.
 */

import type { ZodError } from 'zod'
import type { FrameSource } from '@/types'
import { collectFrame, type EngineResult } from '@/lib/frame'
import { generateId } from '@/lib/utils'
import { OperationError, ValidationError } from './errors'
import { operationSpecSchema, type OperationSpecInput } from './params'
import { applySpec, labelFor, validateSpec } from './registry'
import type {
  OperationContext,
  OperationKind,
  OperationSpec,
  OperationState,
  ValidationContext,
  ValidationIssue,
} from './types'

// ===== STATE MACHINE =====

const TRANSITIONS: Record<OperationState, readonly OperationState[]> = {
  queued: ['executed', 'failed', 'undone'],
  // back to queued when a rebuild or edit invalidates it
  executed: ['undone', 'queued'],
  // retried failures may succeed or fail again
  failed: ['executed', 'failed', 'undone', 'queued'],
  undone: ['queued'],
}

export function canTransition(from: OperationState, to: OperationState): boolean {
  return TRANSITIONS[from].includes(to)
}

export interface SerializedOperation {
  id: string
  kind: OperationKind
  params: OperationSpec['params']
  label: string
  state: OperationState
  createdAtSeq: number
}

export class Operation {
  readonly id: string
  readonly spec: OperationSpec
  readonly label: string
  readonly createdAtSeq: number

  private currentState: OperationState = 'queued'
  private lastError: OperationError | null = null

  constructor(spec: OperationSpec, createdAtSeq: number, id: string = generateId()) {
    this.id = id
    this.spec = spec
    this.label = labelFor(spec)
    this.createdAtSeq = createdAtSeq
  }

  get kind(): OperationKind {
    return this.spec.kind
  }

  get params(): OperationSpec['params'] {
    return this.spec.params
  }

  get state(): OperationState {
    return this.currentState
  }

  get error(): OperationError | null {
    return this.lastError
  }

  markExecuted(): void {
    this.transition('executed')
    this.lastError = null
  }

  markFailed(error: OperationError): void {
    this.transition('failed')
    this.lastError = error
  }

  markUndone(): void {
    this.transition('undone')
    this.lastError = null
  }

  markQueued(): void {
    this.transition('queued')
    this.lastError = null
  }

  /**
   * Run the transform. Lazy inputs are collected first. Engine failures come
   * back as results; only unexpected exceptions propagate.
   */
  async apply(source: FrameSource, ctx: OperationContext): Promise<EngineResult> {
    const frame = await collectFrame(source)
    return applySpec(this.spec, frame, ctx)
  }

  /** Copy with the same identity and sequence, back in the queued state */
  withSpec(spec: OperationSpec): Operation {
    return new Operation(spec, this.createdAtSeq, this.id)
  }

  toJSON(): SerializedOperation {
    return {
      id: this.id,
      kind: this.kind,
      params: this.params,
      label: this.label,
      state: this.currentState,
      createdAtSeq: this.createdAtSeq,
    }
  }

  private transition(to: OperationState): void {
    if (!canTransition(this.currentState, to)) {
      throw new Error(`Invalid operation state transition: ${this.currentState} -> ${to} (${this.label})`)
    }
    this.currentState = to
  }
}

// ===== CREATION =====

function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((zodIssue) => {
    const path = zodIssue.path.filter((segment) => segment !== 'params').join('.')
    return {
      code: 'INVALID_PARAMS',
      message: path ? `${path}: ${zodIssue.message}` : zodIssue.message,
      field: path || undefined,
    }
  })
}

/**
 * Structural validation only: shape, enums and required fields.
 */
export function parseOperationSpec(input: unknown): OperationSpec {
  const parsed = operationSpecSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error))
  }
  return parsed.data
}

export interface CreateOperationContext extends ValidationContext {
  createdAtSeq: number
  id?: string
}

/**
 * Validate a spec and build a queued operation.
 *
 * @throws ValidationError when the spec is malformed or does not fit the
 *   projected columns
 */
export function createOperation(input: OperationSpecInput, ctx: CreateOperationContext): Operation {
  const spec = parseOperationSpec(input)
  const issues = validateSpec(spec, ctx)
  if (issues.length > 0) {
    throw new ValidationError(issues)
  }
  return new Operation(spec, ctx.createdAtSeq, ctx.id)
}
