import { describe, it, expect } from 'vitest'
import {
  canTransition,
  createOperation,
  getOperationKinds,
  isOperationKind,
  ValidationError,
  type OperationSpecInput,
  type ValidationIssue,
} from '@/lib/operations'
import { cities, handleOf, passengers } from '@/test/fixtures'

const datasets = { cities: handleOf('cities', cities()) }

function create(spec: OperationSpecInput, createdAtSeq = 1) {
  return createOperation(spec, {
    createdAtSeq,
    columns: passengers().columns,
    resolveDataset: (id) => (id === 'cities' ? datasets.cities : undefined),
  })
}

function issuesOf(spec: OperationSpecInput): ValidationIssue[] {
  try {
    create(spec)
  } catch (error) {
    if (error instanceof ValidationError) return error.issues
    throw error
  }
  throw new Error('expected a ValidationError')
}

describe('createOperation', () => {
  it('builds a queued operation with a derived label', () => {
    const op = create({ kind: 'filter', params: { column: 'Age', operator: 'gt', value: 30 } }, 4)

    expect(op.kind).toBe('filter')
    expect(op.state).toBe('queued')
    expect(op.createdAtSeq).toBe(4)
    expect(op.label).toBe('Filter: Age > 30')
    expect(op.error).toBeNull()
  })

  it('quotes string values in filter labels', () => {
    const op = create({ kind: 'filter', params: { column: 'Fare', operator: 'lt', value: 'abc' } })

    expect(op.label).toBe('Filter: Fare < "abc"')
  })

  it('fills param defaults while parsing', () => {
    const op = create({ kind: 'sort', params: { keys: [{ column: 'Age' }] } })

    expect(op.params).toEqual({ keys: [{ column: 'Age', direction: 'asc' }] })
    expect(op.label).toBe('Sort: Age asc')
  })

  it('labels every kind', () => {
    expect(
      create({
        kind: 'aggregate',
        params: { groupBy: ['City'], aggregations: [{ column: 'Fare', functions: ['sum', 'mean'] }] },
      }).label
    ).toBe('Aggregate: sum(Fare), mean(Fare) by City')
    expect(create({ kind: 'search', params: { query: 'oslo' } }).label).toBe("Search: 'oslo'")
    expect(create({ kind: 'join', params: { rightDatasetId: 'cities', leftKey: 'City', rightKey: 'City' } }).label).toBe(
      'Join: inner join on City'
    )
    expect(create({ kind: 'column_edit', params: { action: 'rename', column: 'Name', newName: 'Passenger' } }).label).toBe(
      'Rename: Name → Passenger'
    )
    expect(create({ kind: 'column_edit', params: { action: 'drop', columns: ['Fare', 'City'] } }).label).toBe(
      'Drop columns: Fare, City'
    )
  })

  describe('validation', () => {
    it('rejects unknown columns', () => {
      expect(issuesOf({ kind: 'filter', params: { column: 'Deck', operator: 'eq', value: 'A' } })).toEqual([
        { code: 'NO_COLUMN', message: 'Column "Deck" does not exist', field: 'column' },
      ])
    })

    it('rejects operators that do not fit the column type', () => {
      const issues = issuesOf({ kind: 'filter', params: { column: 'Age', operator: 'contains', value: '3' } })

      expect(issues.map((i) => i.code)).toEqual(['INVALID_OPERATOR'])
      expect(issues[0].field).toBe('operator')
    })

    it('requires a value for binary operators', () => {
      expect(issuesOf({ kind: 'filter', params: { column: 'Age', operator: 'eq' } })).toEqual([
        { code: 'VALUE_REQUIRED', message: 'Operator "eq" requires a value', field: 'value' },
      ])
    })

    it('reports structural problems with the field path inside params', () => {
      const issues = issuesOf({ kind: 'search', params: { query: '   ' } })

      expect(issues).toEqual([
        { code: 'INVALID_PARAMS', message: 'query: Search query must not be empty', field: 'query' },
      ])
    })

    it('rejects numeric reducers on text columns', () => {
      const issues = issuesOf({
        kind: 'aggregate',
        params: { aggregations: [{ column: 'Name', functions: ['sum'] }] },
      })

      expect(issues).toEqual([
        {
          code: 'INVALID_FUNCTION',
          message: 'Function "sum" requires a numeric column; "Name" is text',
          field: 'aggregations.0.functions',
        },
      ])
    })

    it('rejects duplicate sort keys', () => {
      const issues = issuesOf({ kind: 'sort', params: { keys: [{ column: 'Age' }, { column: 'Age', direction: 'desc' }] } })

      expect(issues.map((i) => i.code)).toEqual(['DUPLICATE_KEY'])
    })

    it('rejects a rename onto an existing column', () => {
      const issues = issuesOf({ kind: 'column_edit', params: { action: 'rename', column: 'Name', newName: 'City' } })

      expect(issues.map((i) => i.code)).toEqual(['COLUMN_EXISTS'])
    })

    it('rejects joins against datasets that are not loaded', () => {
      expect(issuesOf({ kind: 'join', params: { rightDatasetId: 'ports', leftKey: 'City', rightKey: 'City' } })).toEqual([
        { code: 'NO_DATASET', message: 'Dataset "ports" is not loaded', field: 'rightDatasetId' },
      ])
    })

    it('rejects join keys of incompatible types', () => {
      const issues = issuesOf({ kind: 'join', params: { rightDatasetId: 'cities', leftKey: 'Age', rightKey: 'City' } })

      expect(issues.map((i) => i.code)).toEqual(['INCOMPATIBLE_KEYS'])
    })
  })
})

describe('operation state machine', () => {
  it('allows the documented transitions only', () => {
    expect(canTransition('queued', 'executed')).toBe(true)
    expect(canTransition('queued', 'failed')).toBe(true)
    expect(canTransition('executed', 'undone')).toBe(true)
    expect(canTransition('failed', 'executed')).toBe(true)
    expect(canTransition('undone', 'queued')).toBe(true)
    expect(canTransition('undone', 'executed')).toBe(false)
    expect(canTransition('executed', 'failed')).toBe(false)
  })

  it('throws on an invalid transition and keeps the current state', () => {
    const op = create({ kind: 'filter', params: { column: 'Age', operator: 'gt', value: 30 } })
    op.markUndone()

    expect(() => op.markExecuted()).toThrow('Invalid operation state transition: undone -> executed (Filter: Age > 30)')
    expect(op.state).toBe('undone')
  })

  it('serializes kind, params, label, state and sequence', () => {
    const op = create({ kind: 'filter', params: { column: 'Age', operator: 'gt', value: 30 } }, 2)
    op.markExecuted()

    expect(op.toJSON()).toEqual({
      id: op.id,
      kind: 'filter',
      params: { column: 'Age', operator: 'gt', value: 30 },
      label: 'Filter: Age > 30',
      state: 'executed',
      createdAtSeq: 2,
    })
  })
})

describe('registry', () => {
  it('knows every operation kind', () => {
    expect(getOperationKinds()).toEqual(['filter', 'search', 'aggregate', 'pivot', 'join', 'sort', 'column_edit'])
    expect(isOperationKind('pivot')).toBe(true)
    expect(isOperationKind('window')).toBe(false)
  })
})
