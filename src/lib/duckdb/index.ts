/**
 * DuckDB connection
 *
 * One in-memory database per process, opened on first use. Statements are
 * serialized through a mutex: a frame is loaded, queried and dropped as one
 * unit, so callers hold the lock for the whole cycle via withConnection().
 */

import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api'
import { AsyncMutex } from '@/lib/utils/mutex'

let conn: DuckDBConnection | null = null
let opening: Promise<DuckDBConnection> | null = null

const duckdbMutex = new AsyncMutex()

async function initDuckDB(): Promise<DuckDBConnection> {
  const instance = await DuckDBInstance.create(':memory:')
  const connection = await instance.connect()
  console.log('[DuckDB] In-memory database ready')
  conn = connection
  return connection
}

export async function getConnection(): Promise<DuckDBConnection> {
  if (conn) return conn
  opening ??= initDuckDB().finally(() => {
    opening = null
  })
  return opening
}

/**
 * Run `operation` with exclusive use of the connection
 */
export async function withConnection<T>(operation: (connection: DuckDBConnection) => Promise<T>): Promise<T> {
  return duckdbMutex.acquire(async () => operation(await getConnection()))
}

export interface QueryResult {
  columns: string[]
  rows: DuckDBValue[][]
}

/**
 * Read a full result on a connection the caller already holds
 */
export async function readAll(connection: DuckDBConnection, sql: string): Promise<QueryResult> {
  const reader = await connection.runAndReadAll(sql)
  return { columns: reader.columnNames(), rows: reader.getRows() }
}
