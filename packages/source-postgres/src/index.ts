import type { ColumnMeta, QuerySource, ResultSetOptions } from '@rowshape/core'
import { ArrayRowSource, debugEntry, normalizeRow, parseIntegerText, ResultSet, SourceError } from '@rowshape/core'
import { Pool, types } from 'pg'

import { describePgType } from './types.js'

// NUMERIC/DECIMAL as numbers; INT8 as numbers, or bigints past 2^53
types.setTypeParser(1700, parseFloat) // numeric / decimal
types.setTypeParser(20, parseIntegerText) // int8 / bigint

export interface PostgresSourceConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: boolean | undefined
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
}

export function createPostgresSource(config: PostgresSourceConfig): QuerySource {
  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  return {
    async query(sql: string, params: unknown[] = [], options: ResultSetOptions = {}): Promise<ResultSet> {
      const t0 = Date.now()
      try {
        const result = await pool.query<Record<string, unknown>>(sql, params)
        const columns: ColumnMeta[] = result.fields.map((field) => ({
          name: field.name,
          ...describePgType(field.dataTypeID),
        }))
        const rows = result.rows.map(normalizeRow)
        return new ResultSet(new ArrayRowSource(rows, columns), {
          ...options,
          debugLog: [
            ...(options.debugLog ?? []),
            debugEntry('execution', `Executed on postgres (${String(rows.length)} rows)`, Date.now() - t0, { sql }),
          ],
        })
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new SourceError({ code: 'QUERY_FAILED', engine: 'postgres', sql, params: [...params], cause }, cause)
      }
    },

    async ping(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (_err) {
        throw new SourceError({ code: 'CONNECTION_FAILED', engine: 'postgres', url: config.connectionString })
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}

export type { QuerySource } from '@rowshape/core'
export { describePgType } from './types.js'
