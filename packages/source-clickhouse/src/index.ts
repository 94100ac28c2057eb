import { createClient } from '@clickhouse/client'
import type { ColumnMeta, QuerySource, ResultSetOptions } from '@rowshape/core'
import { ArrayRowSource, debugEntry, normalizeRow, ResultSet, SourceError } from '@rowshape/core'

import { clickHouseColumnType, unwrapClickHouseType } from './types.js'

export interface ClickHouseSourceConfig {
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  readonly timeoutMs?: number | undefined
}

export function createClickHouseSource(config: ClickHouseSourceConfig): QuerySource {
  const settings: Record<string, number | string | boolean> = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    clickhouse_settings: settings,
  })

  return {
    async query(sql: string, params: unknown[] = [], options: ResultSetOptions = {}): Promise<ResultSet> {
      const t0 = Date.now()
      try {
        // positional params are bound as {p1:Type}, {p2:Type}, …
        const queryParams: Record<string, unknown> = {}
        for (let i = 0; i < params.length; i++) {
          queryParams[`p${String(i + 1)}`] = params[i]
        }

        const result = await client.query({
          query: sql,
          query_params: queryParams,
          format: 'JSON',
        })
        const body = await result.json<Record<string, unknown>>()

        const columns: ColumnMeta[] = (body.meta ?? []).map((col) => ({
          name: col.name,
          nativeType: col.type,
          type: clickHouseColumnType(col.type),
          nullable: unwrapClickHouseType(col.type).nullable,
        }))
        const rows = body.data.map(normalizeRow)

        return new ResultSet(new ArrayRowSource(rows, columns), {
          ...options,
          debugLog: [
            ...(options.debugLog ?? []),
            debugEntry('execution', `Executed on clickhouse (${String(rows.length)} rows)`, Date.now() - t0, { sql }),
          ],
        })
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new SourceError({ code: 'QUERY_FAILED', engine: 'clickhouse', sql, params: [...params], cause }, cause)
      }
    },

    async ping(): Promise<void> {
      try {
        const result = await client.ping()
        if (!result.success) {
          throw new SourceError({ code: 'CONNECTION_FAILED', engine: 'clickhouse', url: config.url })
        }
      } catch (err) {
        if (err instanceof SourceError) throw err
        throw new SourceError({ code: 'CONNECTION_FAILED', engine: 'clickhouse', url: config.url })
      }
    },

    async close(): Promise<void> {
      await client.close()
    },
  }
}

export type { QuerySource } from '@rowshape/core'
export { clickHouseColumnType, unwrapClickHouseType } from './types.js'
