import type { DuckDBConnection, DuckDBValue } from '@duckdb/node-api'
import type { CellValue, ColumnInfo, DataFrame, Row, TypeCategory } from '@/types'
import { INSERT_BATCH_SIZE } from '@/lib/constants'
import { readAll, withConnection } from '@/lib/duckdb'
import { buildFilterCondition, combineConditions, getComparisonSql } from '@/lib/sql/filter-builder'
import { quoteIdentifier, toSqlValue } from '@/lib/sql/sql'
import { getReducerOutputType, requiresNumericInput, type ReducerFunction } from './aggregations'
import {
  columnNotFound,
  fail,
  ok,
  type AggregationSpec,
  type Condition,
  type DataFrameEngine,
  type EngineError,
  type EngineErrorKind,
  type EngineResult,
  type JoinSpec,
  type PivotSpec,
  type SortKey,
} from './engine'
import { createFrame, findColumn } from './frame'
import { planJoinColumns } from './join-plan'
import { getColumnTypeForCategory, getTypeCategory, isOperatorValidForCategory } from './type-category'
import { toBoolean, toDateMillis, toNumber, toText } from './values'

/**
 * DuckDB-backed dataframe engine.
 *
 * Each call loads its input frames into temporary tables, lets DuckDB decide
 * which rows survive, in which order, and what the aggregates are, then drops
 * the tables. Every table carries a `row_idx` column with the input position:
 * row order is pinned by it, and untouched cells are read back from the input
 * rows, so values pass through with their original representation.
 */
export function createDuckDBEngine(): DataFrameEngine {
  return {
    filter: (frame, condition) => guarded('filter', () => filterFrame(frame, condition)),
    groupBy: (frame, keys, aggregations) => guarded('group by', () => groupBy(frame, keys, aggregations)),
    pivot: (frame, spec) => guarded('pivot', () => pivot(frame, spec)),
    join: (left, right, spec) => guarded('join', () => join(left, right, spec)),
    sort: (frame, keys) => guarded('sort', () => sortFrame(frame, keys)),
    rename: async (frame, mapping) => rename(frame, mapping),
    select: async (frame, columns) => select(frame, columns),
    drop: async (frame, columns) => drop(frame, columns),
    cast: (frame, column, to) => guarded('cast', () => cast(frame, column, to)),
    fillNull: (frame, column, value) => guarded('fill null', () => fillNull(frame, column, value)),
  }
}

// ===== TABLES =====

interface Slot {
  /** Frame column name */
  column: string
  /** Internal column name inside the table */
  name: string
  category: TypeCategory
  storage: string
}

interface LoadedFrame {
  table: string
  slots: Map<string, Slot>
}

let tableCounter = 0

function storageType(column: ColumnInfo, rows: DataFrame['rows']): string {
  switch (getTypeCategory(column.type)) {
    case 'numeric': {
      const integral =
        column.type.toUpperCase().includes('INT') &&
        rows.every((row) => {
          const n = toNumber(row[column.name] ?? null)
          return n === null || Number.isSafeInteger(n)
        })
      return integral ? 'BIGINT' : 'DOUBLE'
    }
    case 'boolean':
      return 'BOOLEAN'
    case 'date':
      return 'TIMESTAMP'
    case 'text':
    case 'unknown':
      return 'VARCHAR'
  }
}

/**
 * SQL literal for a cell as stored in a slot. Values that do not read as the
 * slot's type are stored as NULL.
 */
function storedLiteral(value: CellValue, slot: Slot): string {
  switch (slot.category) {
    case 'numeric':
      return toSqlValue(toNumber(value))
    case 'boolean':
      return toSqlValue(toBoolean(value))
    case 'date': {
      const ms = toDateMillis(value)
      return ms === null ? 'NULL' : `epoch_ms(${Math.trunc(ms)})`
    }
    case 'text':
    case 'unknown':
      return value === null ? 'NULL' : toSqlValue(toText(value))
  }
}

async function load(connection: DuckDBConnection, frame: DataFrame): Promise<LoadedFrame> {
  tableCounter += 1
  const table = `frame_${tableCounter}`
  const slots = frame.columns.map(
    (column, i): Slot => ({
      column: column.name,
      name: `c${i}`,
      category: getTypeCategory(column.type),
      storage: storageType(column, frame.rows),
    })
  )

  const definitions = ['row_idx INTEGER', ...slots.map((slot) => `${slot.name} ${slot.storage}`)]
  await connection.run(`CREATE TEMP TABLE ${table} (${definitions.join(', ')})`)

  for (let start = 0; start < frame.rows.length; start += INSERT_BATCH_SIZE) {
    const tuples = frame.rows.slice(start, start + INSERT_BATCH_SIZE).map((row, offset) => {
      const cells = slots.map((slot) => storedLiteral(row[slot.column] ?? null, slot))
      return `(${[String(start + offset), ...cells].join(', ')})`
    })
    await connection.run(`INSERT INTO ${table} VALUES ${tuples.join(', ')}`)
  }

  return { table, slots: new Map(slots.map((slot) => [slot.column, slot])) }
}

/**
 * Load frames, run `work` against their tables, and drop the tables again.
 * The connection stays locked for the whole cycle.
 */
async function withTables<T>(
  frames: DataFrame[],
  work: (connection: DuckDBConnection, tables: LoadedFrame[]) => Promise<T>
): Promise<T> {
  return withConnection(async (connection) => {
    const tables: LoadedFrame[] = []
    try {
      for (const frame of frames) {
        tables.push(await load(connection, frame))
      }
      return await work(connection, tables)
    } finally {
      for (const { table } of tables) {
        await connection.run(`DROP TABLE IF EXISTS ${table}`)
      }
    }
  })
}

function slotOf(table: LoadedFrame, column: string): string {
  const slot = table.slots.get(column)
  if (!slot) {
    throw new Error(`Column "${column}" is not loaded`)
  }
  return slot.name
}

// ===== RESULTS =====

function toCell(value: DuckDBValue): CellValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'bigint') {
    return Number(value)
  }
  // Temporal and nested values render through DuckDB's own text form
  return String(value)
}

function toIndex(value: DuckDBValue | undefined): number | null {
  const cell = value === undefined ? null : toCell(value)
  return typeof cell === 'number' ? cell : null
}

function cellAt(frame: DataFrame, index: number | null, column: string): CellValue {
  return index === null ? null : (frame.rows[index]?.[column] ?? null)
}

async function selectIndexes(connection: DuckDBConnection, sql: string): Promise<number[]> {
  const { rows } = await readAll(connection, sql)
  const indexes: number[] = []
  for (const row of rows) {
    const index = toIndex(row[0])
    if (index !== null) indexes.push(index)
  }
  return indexes
}

function classify(message: string): EngineErrorKind {
  if (/conversion error|could not convert|no function matches|cannot compare|unimplemented type for cast/i.test(message)) {
    return 'TYPE_MISMATCH'
  }
  if (/referenced column .* not found/i.test(message)) {
    return 'COLUMN_NOT_FOUND'
  }
  return 'ENGINE_INTERNAL'
}

async function guarded(label: string, run: () => Promise<EngineResult>): Promise<EngineResult> {
  try {
    return await run()
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.warn(`[DuckDB] ${label} failed: ${message}`)
    return fail(classify(message), message)
  }
}

function missingColumn(frame: DataFrame, names: string[]): string | undefined {
  return names.find((name) => !findColumn(frame.columns, name))
}

function categoryOf(frame: DataFrame, name: string): TypeCategory {
  const column = findColumn(frame.columns, name)
  return column ? getTypeCategory(column.type) : 'unknown'
}

// ===== FILTER =====

type WhereResult = { ok: true; sql: string } | { ok: false; error: EngineError }

/**
 * Render a condition over the table's slots. The comparison value is parsed
 * here, so a value that cannot be read as the column's type fails before any
 * row is read.
 */
function buildWhere(condition: Condition, frame: DataFrame, table: LoadedFrame): WhereResult {
  if (condition.type === 'and' || condition.type === 'or') {
    const parts: string[] = []
    for (const child of condition.conditions) {
      const built = buildWhere(child, frame, table)
      if (!built.ok) return built
      parts.push(built.sql)
    }
    return { ok: true, sql: combineConditions(parts, condition.type === 'and' ? 'AND' : 'OR') }
  }

  const { column: columnName, operator, value } = condition
  const column = findColumn(frame.columns, columnName)
  if (!column) {
    return { ok: false, error: columnNotFound(columnName) }
  }
  const category = getTypeCategory(column.type)
  if (!isOperatorValidForCategory(operator, category)) {
    return invalidWhere(`Operator "${operator}" is not valid for ${category} column "${columnName}"`)
  }

  const slot = slotOf(table, columnName)
  if (operator === 'is_null' || operator === 'is_not_null' || operator === 'is_true' || operator === 'is_false') {
    return { ok: true, sql: buildFilterCondition(slot, operator, null, category) }
  }
  if (value === undefined || value === null) {
    return invalidWhere(`Operator "${operator}" requires a value`)
  }

  switch (category) {
    case 'numeric': {
      const target = toNumber(value)
      if (target === null) return mismatch(category, columnName, value)
      return { ok: true, sql: buildFilterCondition(slot, operator, target, category) }
    }
    case 'date': {
      const target = toDateMillis(value)
      if (target === null) return mismatch(category, columnName, value)
      return {
        ok: true,
        sql: `${quoteIdentifier(slot)} ${getComparisonSql(operator)} epoch_ms(${Math.trunc(target)})`,
      }
    }
    case 'boolean': {
      const target = toBoolean(value)
      if (target === null) return mismatch(category, columnName, value)
      return { ok: true, sql: buildFilterCondition(slot, operator, target, category) }
    }
    case 'text':
    case 'unknown':
      return { ok: true, sql: buildFilterCondition(slot, operator, String(value), category) }
  }
}

function invalidWhere(message: string): WhereResult {
  return { ok: false, error: { kind: 'INVALID_OPERATOR', message } }
}

function mismatch(category: TypeCategory, column: string, value: CellValue): WhereResult {
  return {
    ok: false,
    error: {
      kind: 'TYPE_MISMATCH',
      message: `Cannot compare ${category} column "${column}" with ${JSON.stringify(value)}`,
    },
  }
}

async function filterFrame(frame: DataFrame, condition: Condition): Promise<EngineResult> {
  return withTables([frame], async (connection, [table]) => {
    const where = buildWhere(condition, frame, table)
    if (!where.ok) {
      return { ok: false, error: where.error }
    }
    const indexes = await selectIndexes(
      connection,
      `SELECT row_idx FROM ${table.table} WHERE ${where.sql} ORDER BY row_idx`
    )
    return ok(
      createFrame(
        frame.columns,
        indexes.map((i) => frame.rows[i])
      )
    )
  })
}

// ===== AGGREGATION =====

interface Reduction {
  sql: string
  /** The expression yields a row position; the value is read from that input row */
  picksRow: boolean
}

function reduction(fn: ReducerFunction, slot: string, filter?: string): Reduction {
  const column = quoteIdentifier(slot)
  const where = filter ? ` FILTER (WHERE ${filter})` : ''
  switch (fn) {
    case 'len':
      return { sql: `COUNT(*)${where}`, picksRow: false }
    case 'count':
      return { sql: `COUNT(${column})${where}`, picksRow: false }
    case 'sum':
      return { sql: `COALESCE(SUM(${column})${where}, 0)`, picksRow: false }
    case 'mean':
      return { sql: `AVG(${column})${where}`, picksRow: false }
    case 'median':
      return { sql: `MEDIAN(CAST(${column} AS DOUBLE))${where}`, picksRow: false }
    case 'std':
      return { sql: `STDDEV_SAMP(${column})${where}`, picksRow: false }
    case 'min':
      return { sql: `ARG_MIN(row_idx, ${column})${where}`, picksRow: true }
    case 'max':
      return { sql: `ARG_MAX(row_idx, ${column})${where}`, picksRow: true }
    case 'first':
      return { sql: `MIN(row_idx)${where}`, picksRow: true }
    case 'last':
      return { sql: `MAX(row_idx)${where}`, picksRow: true }
  }
}

function reducedCell(frame: DataFrame, value: DuckDBValue | undefined, picksRow: boolean, column: string): CellValue {
  if (picksRow) {
    return cellAt(frame, toIndex(value), column)
  }
  return value === undefined ? null : toCell(value)
}

async function groupBy(frame: DataFrame, keys: string[], aggregations: AggregationSpec[]): Promise<EngineResult> {
  const missing = missingColumn(frame, [...keys, ...aggregations.map((a) => a.column)])
  if (missing) return { ok: false, error: columnNotFound(missing) }

  for (const agg of aggregations) {
    const category = categoryOf(frame, agg.column)
    if (requiresNumericInput(agg.fn) && category !== 'numeric') {
      return fail('TYPE_MISMATCH', `Cannot compute ${agg.fn} of ${category} column "${agg.column}"`)
    }
  }

  const columns: ColumnInfo[] = [
    ...keys.map((k) => findColumn(frame.columns, k)).filter((c): c is ColumnInfo => c !== undefined),
    ...aggregations.map((agg) => ({
      name: agg.alias,
      type: getReducerOutputType(agg.fn, findColumn(frame.columns, agg.column)?.type ?? 'VARCHAR'),
      nullable: true,
    })),
  ]

  return withTables([frame], async (connection, [table]) => {
    const reductions = aggregations.map((agg) => reduction(agg.fn, slotOf(table, agg.column)))
    const groupClause =
      keys.length > 0 ? ` GROUP BY ${keys.map((k) => quoteIdentifier(slotOf(table, k))).join(', ')}` : ''
    // Groups come out in order of first appearance
    const { rows: results } = await readAll(
      connection,
      `SELECT MIN(row_idx) AS first_idx${reductions.map((r) => `, ${r.sql}`).join('')} FROM ${table.table}${groupClause} ORDER BY first_idx NULLS LAST`
    )

    const rows = results.map((result) => {
      const first = toIndex(result[0])
      const out: Row = {}
      for (const key of keys) {
        out[key] = cellAt(frame, first, key)
      }
      aggregations.forEach((agg, i) => {
        out[agg.alias] = reducedCell(frame, result[i + 1], reductions[i].picksRow, agg.column)
      })
      return out
    })
    return ok(createFrame(columns, rows))
  })
}

// ===== PIVOT =====

function pivotLabel(row: Readonly<Row> | undefined, on: string[]): string {
  const cell = (column: string): CellValue => row?.[column] ?? null
  if (on.length === 1) return toText(cell(on[0]))
  return on.map((c) => `${c}_${toText(cell(c))}`).join('-')
}

async function pivot(frame: DataFrame, spec: PivotSpec): Promise<EngineResult> {
  const missing = missingColumn(frame, [...spec.index, ...spec.on, ...spec.values.map((v) => v.column)])
  if (missing) return { ok: false, error: columnNotFound(missing) }

  for (const value of spec.values) {
    const category = categoryOf(frame, value.column)
    if (category !== 'numeric') {
      return fail('TYPE_MISMATCH', `Pivot values must be numeric: "${value.column}" is ${category}`)
    }
  }

  return withTables([frame], async (connection, [table]) => {
    const onSlots = spec.on.map((c) => {
      const slot = table.slots.get(c)
      if (!slot) throw new Error(`Column "${c}" is not loaded`)
      return slot
    })
    const present = onSlots.map((slot) => `${quoteIdentifier(slot.name)} IS NOT NULL`).join(' AND ')
    const whereClause = present ? ` WHERE ${present}` : ''

    // Pivot labels in order of first appearance, with the predicate selecting each
    const labelRows = await selectIndexes(
      connection,
      `SELECT MIN(row_idx) AS first_idx FROM ${table.table}${whereClause} GROUP BY ${onSlots
        .map((slot) => quoteIdentifier(slot.name))
        .join(', ')} ORDER BY first_idx`
    )
    const labels = new Map<string, string[]>()
    for (const index of labelRows) {
      const row = frame.rows[index]
      const label = pivotLabel(row, spec.on)
      const match = onSlots
        .map((slot) => `${quoteIdentifier(slot.name)} = ${storedLiteral(row?.[slot.column] ?? null, slot)}`)
        .join(' AND ')
      labels.set(label, [...(labels.get(label) ?? []), `(${match})`])
    }

    const columns: ColumnInfo[] = spec.index
      .map((c) => findColumn(frame.columns, c))
      .filter((c): c is ColumnInfo => c !== undefined)
    const cells: { name: string; column: string; reduction: Reduction }[] = []
    for (const value of spec.values) {
      const sourceType = findColumn(frame.columns, value.column)?.type ?? 'DOUBLE'
      for (const [label, matches] of labels) {
        const name = `${value.column}_${value.fn}_${label}`
        const filter = matches.join(' OR ')
        const inner = reduction(value.fn, slotOf(table, value.column), filter)
        // A label absent from a group leaves the cell empty
        cells.push({
          name,
          column: value.column,
          reduction: {
            sql: `CASE WHEN COUNT(*) FILTER (WHERE ${filter}) = 0 THEN NULL ELSE ${inner.sql} END`,
            picksRow: inner.picksRow,
          },
        })
        columns.push({ name, type: getReducerOutputType(value.fn, sourceType), nullable: true })
      }
    }

    const groupClause =
      spec.index.length > 0
        ? ` GROUP BY ${spec.index.map((c) => quoteIdentifier(slotOf(table, c))).join(', ')}`
        : ' HAVING COUNT(*) > 0'
    const { rows: results } = await readAll(
      connection,
      `SELECT MIN(row_idx) AS first_idx${cells.map((c) => `, ${c.reduction.sql}`).join('')} FROM ${table.table}${whereClause}${groupClause} ORDER BY first_idx`
    )

    const rows = results.map((result) => {
      const first = toIndex(result[0])
      const out: Row = {}
      for (const c of spec.index) {
        out[c] = cellAt(frame, first, c)
      }
      cells.forEach((cell, i) => {
        out[cell.name] = reducedCell(frame, result[i + 1], cell.reduction.picksRow, cell.column)
      })
      return out
    })
    return ok(createFrame(columns, rows))
  })
}

// ===== JOIN =====

function joinSql(spec: JoinSpec, left: LoadedFrame, right: LoadedFrame): string {
  const from = `${left.table} l`
  if (spec.how === 'cross') {
    return `SELECT l.row_idx, r.row_idx FROM ${from} CROSS JOIN ${right.table} r ORDER BY 1, 2`
  }

  const on = `l.${quoteIdentifier(slotOf(left, spec.leftOn ?? ''))} = r.${quoteIdentifier(slotOf(right, spec.rightOn ?? ''))}`
  switch (spec.how) {
    case 'semi':
    case 'anti':
      return `SELECT l.row_idx, NULL FROM ${from} WHERE ${spec.how === 'anti' ? 'NOT ' : ''}EXISTS (SELECT 1 FROM ${right.table} r WHERE ${on}) ORDER BY 1`
    case 'inner':
      return `SELECT l.row_idx, r.row_idx FROM ${from} JOIN ${right.table} r ON ${on} ORDER BY 1, 2`
    case 'left':
      return `SELECT l.row_idx, r.row_idx FROM ${from} LEFT JOIN ${right.table} r ON ${on} ORDER BY 1, 2 NULLS LAST`
    case 'outer':
      // Unmatched right rows follow the left side, in right order
      return `SELECT l.row_idx, r.row_idx FROM ${from} FULL OUTER JOIN ${right.table} r ON ${on} ORDER BY 1 NULLS LAST, 2 NULLS LAST`
  }
}

async function join(left: DataFrame, right: DataFrame, spec: JoinSpec): Promise<EngineResult> {
  const { how, leftOn, rightOn, suffix } = spec

  if (how !== 'cross') {
    if (!leftOn || !rightOn) {
      return fail('INVALID_OPERATOR', `Join type "${how}" requires both join keys`)
    }
    if (!findColumn(left.columns, leftOn)) return { ok: false, error: columnNotFound(leftOn) }
    if (!findColumn(right.columns, rightOn)) {
      return fail('COLUMN_NOT_FOUND', `Column "${rightOn}" not found in right dataset`)
    }
    const leftCategory = categoryOf(left, leftOn)
    const rightCategory = categoryOf(right, rightOn)
    if (leftCategory !== rightCategory) {
      return fail(
        'TYPE_MISMATCH',
        `Join keys have incompatible types: "${leftOn}" is ${leftCategory}, "${rightOn}" is ${rightCategory}`
      )
    }
  }

  const { columns, right: mappings } = planJoinColumns(left.columns, right.columns, how, rightOn, suffix)

  return withTables([left, right], async (connection, [leftTable, rightTable]) => {
    const { rows: pairs } = await readAll(connection, joinSql(spec, leftTable, rightTable))

    const rows = pairs.map((pair) => {
      const leftIndex = toIndex(pair[0])
      const rightIndex = toIndex(pair[1])
      const out: Row = {}
      for (const column of left.columns) {
        out[column.name] = cellAt(left, leftIndex, column.name)
      }
      for (const mapping of mappings) {
        out[mapping.target] = cellAt(right, rightIndex, mapping.source)
      }
      return out
    })
    return ok(createFrame(columns, rows))
  })
}

// ===== SORT =====

async function sortFrame(frame: DataFrame, keys: SortKey[]): Promise<EngineResult> {
  const missing = missingColumn(
    frame,
    keys.map((k) => k.column)
  )
  if (missing) return { ok: false, error: columnNotFound(missing) }

  return withTables([frame], async (connection, [table]) => {
    // Nulls last in either direction; ties keep input order
    const order = keys.map(
      (k) => `${quoteIdentifier(slotOf(table, k.column))} ${k.direction === 'desc' ? 'DESC' : 'ASC'} NULLS LAST`
    )
    const indexes = await selectIndexes(
      connection,
      `SELECT row_idx FROM ${table.table} ORDER BY ${[...order, 'row_idx'].join(', ')}`
    )
    return ok(
      createFrame(
        frame.columns,
        indexes.map((i) => frame.rows[i])
      )
    )
  })
}

// ===== COLUMN EDITS =====

// Renames and projections touch column metadata only; rows are reshaped without a query.

function rename(frame: DataFrame, mapping: Record<string, string>): EngineResult {
  const missing = missingColumn(frame, Object.keys(mapping))
  if (missing) return { ok: false, error: columnNotFound(missing) }

  const columns = frame.columns.map((c) => ({ ...c, name: mapping[c.name] ?? c.name }))
  const names = new Set<string>()
  for (const column of columns) {
    if (names.has(column.name)) {
      return fail('INVALID_OPERATOR', `Column "${column.name}" already exists`)
    }
    names.add(column.name)
  }

  const rows = frame.rows.map((row) => {
    const out: Row = {}
    for (const column of frame.columns) {
      out[mapping[column.name] ?? column.name] = row[column.name] ?? null
    }
    return out
  })
  return ok(createFrame(columns, rows))
}

function project(frame: DataFrame, keep: ColumnInfo[]): DataFrame {
  const rows = frame.rows.map((row) => {
    const out: Row = {}
    for (const column of keep) {
      out[column.name] = row[column.name] ?? null
    }
    return out
  })
  return createFrame(keep, rows)
}

function select(frame: DataFrame, names: string[]): EngineResult {
  const missing = missingColumn(frame, names)
  if (missing) return { ok: false, error: columnNotFound(missing) }
  const keep = names
    .map((name) => findColumn(frame.columns, name))
    .filter((c): c is ColumnInfo => c !== undefined)
  return ok(project(frame, keep))
}

function drop(frame: DataFrame, names: string[]): EngineResult {
  const missing = missingColumn(frame, names)
  if (missing) return { ok: false, error: columnNotFound(missing) }
  const dropped = new Set(names)
  return ok(
    project(
      frame,
      frame.columns.filter((c) => !dropped.has(c.name))
    )
  )
}

async function cast(frame: DataFrame, column: string, to: TypeCategory): Promise<EngineResult> {
  if (!findColumn(frame.columns, column)) return { ok: false, error: columnNotFound(column) }
  if (to === 'unknown') {
    return fail('INVALID_OPERATOR', `Cannot cast column "${column}" to an unknown type`)
  }
  const targetType = getColumnTypeForCategory(to)

  return withTables([frame], async (connection, [table]) => {
    const slot = quoteIdentifier(slotOf(table, column))
    const { rows: results } = await readAll(
      connection,
      `SELECT row_idx, TRY_CAST(${slot} AS ${targetType}) FROM ${table.table} WHERE ${slot} IS NOT NULL ORDER BY row_idx`
    )

    const converted = new Map<number, CellValue>()
    for (const result of results) {
      const index = toIndex(result[0])
      if (index === null) continue
      const value = result[1] === undefined ? null : toCell(result[1])
      if (value === null) {
        const original = cellAt(frame, index, column)
        return fail('TYPE_MISMATCH', `Cannot cast ${JSON.stringify(original)} in column "${column}" to ${to}`)
      }
      converted.set(index, value)
    }

    const rows = frame.rows.map((row, i) => ({ ...row, [column]: converted.get(i) ?? null }))
    const columns = frame.columns.map((c) => (c.name === column ? { ...c, type: targetType } : c))
    return ok(createFrame(columns, rows))
  })
}

async function fillNull(frame: DataFrame, column: string, value: CellValue): Promise<EngineResult> {
  if (!findColumn(frame.columns, column)) return { ok: false, error: columnNotFound(column) }
  if (value === null) {
    return fail('INVALID_OPERATOR', 'Fill value must not be null')
  }

  const category = categoryOf(frame, column)
  let fill: CellValue | undefined = value
  if (category === 'numeric') fill = toNumber(value) ?? undefined
  if (category === 'boolean') fill = toBoolean(value) ?? undefined
  if (category === 'date') fill = toDateMillis(value) === null ? undefined : value
  if (category === 'text') fill = toText(value)
  if (fill === undefined) {
    return fail('TYPE_MISMATCH', `Cannot fill ${category} column "${column}" with ${JSON.stringify(value)}`)
  }
  const filled = fill

  return withTables([frame], async (connection, [table]) => {
    const empty = new Set(
      await selectIndexes(
        connection,
        `SELECT row_idx FROM ${table.table} WHERE ${quoteIdentifier(slotOf(table, column))} IS NULL`
      )
    )
    const rows = frame.rows.map((row, i) => (empty.has(i) ? { ...row, [column]: filled } : row))
    const columns = frame.columns.map((c) => (c.name === column ? { ...c, nullable: false } : c))
    return ok(createFrame(columns, rows))
  })
}
