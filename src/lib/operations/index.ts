export * from './types'
export * from './errors'
export {
  AGGREGATE_FUNCTIONS,
  FILTER_OPERATORS,
  JOIN_HOWS,
  OPERATION_KINDS,
  PIVOT_FUNCTIONS,
  cellValueSchema,
  operationSpecSchema,
} from './params'
export { Operation, createOperation, parseOperationSpec, canTransition } from './operation'
export type { CreateOperationContext, SerializedOperation } from './operation'
export { OperationHistory } from './history'
export type { HistoryResult } from './history'
export { ExecutionModeController, decide } from './mode-controller'
export type { DecisionContext, ExecutionDecision } from './mode-controller'
export { ExecutionEngine } from './execution-engine'
export type {
  Checkpoint,
  MaterializeProgress,
  MaterializeRequest,
  MaterializeResult,
  OperationOutcome,
  OutcomeStatus,
} from './execution-engine'
export {
  OPERATION_KIND_LABELS,
  applySpec,
  getDefinition,
  getOperationKinds,
  isOperationKind,
  labelFor,
  projectColumnsFor,
  sqlFor,
  validateSpec,
} from './registry'
