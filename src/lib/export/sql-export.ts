/**
 * SQL Exporter
 *
 * Renders a session's active history as one DuckDB script: a CTE per step,
 * each reading from the previous one, ending in a SELECT of the last.
 */

import type { ColumnInfo, DatasetHandle } from '@/types'
import { projectColumnsFor, sqlFor, type Operation } from '@/lib/operations'
import { quoteIdentifier } from '@/lib/sql/sql'

export interface SqlExportOptions {
  /** Table holding the base dataset */
  sourceTable: string
  /** Columns of the base dataset, when known */
  baseColumns: ColumnInfo[] | null
  /** Table name for a join's right dataset; the quoted dataset id by default */
  resolveTableName?: (datasetId: string) => string
  resolveDataset?: (datasetId: string) => DatasetHandle | undefined
}

function indent(sql: string): string {
  return sql
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n')
}

/**
 * Undone entries are not part of the pipeline. Failed entries contributed
 * nothing to the frame, so they appear only as comments.
 */
export function exportSql(entries: readonly Operation[], options: SqlExportOptions): string {
  const resolveTableName = options.resolveTableName ?? quoteIdentifier
  const resolveDataset = options.resolveDataset ?? (() => undefined)

  let source = quoteIdentifier(options.sourceTable)
  let columns = options.baseColumns
  let pendingComments: string[] = []
  const ctes: string[] = []
  let position = 0

  for (const op of entries) {
    if (op.state === 'undone') continue
    position++

    if (op.state === 'failed') {
      pendingComments.push(`-- ${position}. skipped (failed): ${op.label}`)
      continue
    }

    const name = `step_${position}`
    const body = sqlFor(op.spec, { source, columns, resolveTableName, resolveDataset })
    ctes.push([...pendingComments, `-- ${position}. ${op.label}`, `${name} AS (`, indent(body), ')'].join('\n'))
    pendingComments = []

    source = name
    columns = projectColumnsFor(op.spec, { columns, resolveDataset })
  }

  const lines = [`-- Pipeline over ${quoteIdentifier(options.sourceTable)}`]
  if (ctes.length > 0) {
    lines.push('WITH', ctes.join(',\n'))
  }
  lines.push(...pendingComments, `SELECT * FROM ${source};`)
  return lines.join('\n')
}
