import type { AggregateFunction, PivotFunction } from '@/types'

export type ReducerFunction = AggregateFunction | PivotFunction

const NUMERIC_ONLY: ReadonlySet<ReducerFunction> = new Set(['sum', 'mean', 'median', 'std'])

/**
 * Functions that only make sense over numeric input
 */
export function requiresNumericInput(fn: ReducerFunction): boolean {
  return NUMERIC_ONLY.has(fn)
}

export function getReducerOutputType(fn: ReducerFunction, sourceType: string): string {
  switch (fn) {
    case 'count':
    case 'len':
      return 'BIGINT'
    case 'sum':
    case 'mean':
    case 'median':
    case 'std':
      return 'DOUBLE'
    case 'min':
    case 'max':
    case 'first':
    case 'last':
      return sourceType
  }
}
