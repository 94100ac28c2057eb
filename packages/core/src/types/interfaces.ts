import type { ColumnMeta, Row } from '@rowshape/validation'

import type { ResultSet, ResultSetOptions } from '../result/resultSet.js'

// --- RowSource (implemented per data source) ---

/**
 * Cursor over the rows of one executed query.
 *
 * Contract:
 * - `fetchNext()` returns a fresh row and advances, or `null` once exhausted.
 * - `seek()` returns `false` for a position outside the result; it may also throw,
 *   callers rewinding before a bulk read treat both the same.
 * - `release()` is idempotent; once released the source reports no rows.
 */
export interface RowSource {
  seek(position: number): boolean
  rowCount(): number
  fetchNext(): Row | null
  release(): void
  discoverColumns(): readonly ColumnMeta[]
}

// --- QuerySource (implemented by source packages) ---

/**
 * Database-backed factory of result sets.
 *
 * Error contract:
 * - `query()` must throw `SourceError` (code: `'QUERY_FAILED'`) on any failure.
 * - `ping()` must throw `SourceError` (code: `'CONNECTION_FAILED'`) on any failure.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 */
export interface QuerySource {
  query(sql: string, params?: unknown[], options?: ResultSetOptions): Promise<ResultSet>
  ping(): Promise<void>
  close(): Promise<void>
}
