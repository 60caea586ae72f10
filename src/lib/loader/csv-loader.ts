/**
 * CSV Loader
 *
 * Parses delimited text into a DataFrame with inferred column types, in the
 * spirit of DuckDB's read_csv auto-detection: BIGINT, DOUBLE, BOOLEAN, DATE,
 * TIMESTAMP, otherwise VARCHAR. Empty cells become null.
 */

import { readFile } from 'node:fs/promises'
import { basename, extname } from 'node:path'
import { parse } from 'csv-parse/sync'
import type { CellValue, ColumnInfo, DataFrame, LazyFrame, Row } from '@/types'
import { createFrame, createLazyFrame } from '@/lib/frame'

export interface CsvOptions {
  delimiter?: string
  /** Rows used to infer types for a lazy scan */
  sampleRows?: number
}

export class CsvParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CsvParseError'
  }
}

const INTEGER = /^[-+]?\d+$/
const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/
const BOOLEAN = /^(true|false)$/i
const DATE = /^\d{4}-\d{2}-\d{2}$/
const TIMESTAMP = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  )
}

function parseRecords(text: string, options: CsvOptions, toLine?: number): string[][] {
  let records: unknown
  try {
    records = parse(text, {
      delimiter: options.delimiter ?? ',',
      bom: true,
      skip_empty_lines: true,
      ...(toLine === undefined ? {} : { to_line: toLine }),
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new CsvParseError(`Could not parse CSV: ${message}`)
  }
  if (!isStringMatrix(records)) {
    throw new CsvParseError('Could not parse CSV: unexpected record shape')
  }
  return records
}

/**
 * Header names made unique the way DuckDB does: repeated names get _1, _2...
 */
function normalizeHeader(header: string[]): string[] {
  const seen = new Map<string, number>()
  return header.map((raw, i) => {
    const base = raw.trim() === '' ? `column${i}` : raw.trim()
    const count = seen.get(base) ?? 0
    seen.set(base, count + 1)
    return count === 0 ? base : `${base}_${count}`
  })
}

export function inferColumnType(values: string[]): string {
  const present = values.filter((v) => v !== '')
  if (present.length === 0) return 'VARCHAR'
  if (present.every((v) => INTEGER.test(v))) return 'BIGINT'
  if (present.every((v) => DECIMAL.test(v))) return 'DOUBLE'
  if (present.every((v) => BOOLEAN.test(v))) return 'BOOLEAN'
  if (present.every((v) => DATE.test(v))) return 'DATE'
  if (present.every((v) => TIMESTAMP.test(v) || DATE.test(v))) return 'TIMESTAMP'
  return 'VARCHAR'
}

function convertCell(raw: string, type: string): CellValue {
  if (raw === '') return null
  switch (type) {
    case 'BIGINT':
    case 'DOUBLE':
      return Number(raw)
    case 'BOOLEAN':
      return raw.toLowerCase() === 'true'
    default:
      return raw
  }
}

function buildFrame(records: string[][]): DataFrame {
  const [header, ...body] = records
  if (!header) {
    throw new CsvParseError('CSV input is empty')
  }

  const names = normalizeHeader(header)
  const columns: ColumnInfo[] = names.map((name, i) => {
    const values = body.map((record) => record[i] ?? '')
    return {
      name,
      type: inferColumnType(values),
      nullable: values.some((v) => v === ''),
    }
  })

  const rows: Row[] = body.map((record) => {
    const row: Row = {}
    columns.forEach((column, i) => {
      row[column.name] = convertCell(record[i] ?? '', column.type)
    })
    return row
  })

  return createFrame(columns, rows)
}

export function parseCsv(text: string, options: CsvOptions = {}): DataFrame {
  return buildFrame(parseRecords(text, options))
}

export async function loadCsvFile(path: string, options: CsvOptions = {}): Promise<DataFrame> {
  const text = await readFile(path, 'utf8')
  const frame = parseCsv(text, options)
  console.log(`[Loader] Loaded ${path}: ${frame.rows.length} rows, ${frame.columns.length} columns`)
  return frame
}

/**
 * Lazily scan a CSV file. Column types come from the first `sampleRows`
 * rows; rows are only parsed in full on collect().
 */
export async function scanCsvFile(path: string, options: CsvOptions = {}): Promise<LazyFrame> {
  const text = await readFile(path, 'utf8')
  const sampleRows = options.sampleRows ?? 1000
  const sample = buildFrame(parseRecords(text, options, sampleRows + 1))
  return createLazyFrame(sample.columns, async () => parseCsv(await readFile(path, 'utf8'), options))
}

/**
 * Default dataset name for a file: its base name without extension
 */
export function datasetNameFromPath(path: string): string {
  return basename(path, extname(path))
}
