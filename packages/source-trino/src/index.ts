import type { ColumnMeta, QuerySource, ResultSetOptions, Row, RowValue } from '@rowshape/core'
import { ArrayRowSource, debugEntry, ResultSet, SourceError, toRowValue } from '@rowshape/core'
import type { ConnectionOptions } from 'trino-client'
import { Trino } from 'trino-client'

import { trinoColumnType } from './types.js'

export interface TrinoSourceConfig {
  readonly server: string
  readonly catalog?: string | undefined
  readonly schema?: string | undefined
  readonly user?: string | undefined
  readonly source?: string | undefined
  readonly timeoutMs?: number | undefined
}

/** Single-quoted Trino string literal; quotes are doubled, backslashes are literal. */
function quote(text: string): string {
  return `'${text.replaceAll("'", "''")}'`
}

/** Render a bound parameter as a Trino SQL literal. */
function toTrinoLiteral(value: unknown): string {
  switch (typeof value) {
    case 'undefined':
      return 'NULL'
    case 'number':
    case 'bigint':
      return value.toString()
    case 'boolean':
      return value ? 'TRUE' : 'FALSE'
    case 'string':
      return quote(value)
    default:
      break
  }
  if (value === null) return 'NULL'
  if (value instanceof Date) {
    return `TIMESTAMP ${quote(value.toISOString().replace('T', ' ').replace('Z', ''))}`
  }
  if (Array.isArray(value)) return `ARRAY[${value.map(toTrinoLiteral).join(', ')}]`
  throw new TypeError(`Unsupported Trino parameter type: ${typeof value}`)
}

/** Replace each `?` placeholder with the next parameter, in order. */
function bindParams(sql: string, params: readonly unknown[]): string {
  const pending = params[Symbol.iterator]()
  return sql.replace(/\?/g, () => toTrinoLiteral(pending.next().value))
}

interface Collected {
  readonly columns: ColumnMeta[]
  readonly rows: Row[]
}

export function createTrinoSource(config: TrinoSourceConfig): QuerySource {
  const options: ConnectionOptions = {
    server: config.server,
    catalog: config.catalog,
    schema: config.schema,
    source: config.source,
    extraHeaders: config.user !== undefined ? { 'X-Trino-User': config.user } : undefined,
  }

  const trino = Trino.create(options)

  /** Arm a cancel of the running query once `timeoutMs` passes; returns the disarm. */
  function armTimeout(currentId: () => string | undefined): () => void {
    if (config.timeoutMs === undefined) return () => undefined
    const timer = setTimeout(() => {
      const id = currentId()
      if (id !== undefined) trino.cancel(id).catch(() => {})
    }, config.timeoutMs)
    return () => clearTimeout(timer)
  }

  async function collect(sql: string): Promise<Collected> {
    const pages = await trino.query(sql)
    const collected: Collected = { columns: [], rows: [] }
    let queryId: string | undefined
    const disarm = armTimeout(() => queryId)

    try {
      for await (const page of pages) {
        queryId = page.id
        if (page.error !== undefined) {
          const cause = new Error(page.error.message)
          throw new SourceError({ code: 'QUERY_FAILED', engine: 'trino', sql, params: [], cause }, cause)
        }
        // column info arrives with the first page that has it
        if (collected.columns.length === 0 && page.columns !== undefined) {
          collected.columns.push(
            ...page.columns.map((col) => ({ name: col.name, nativeType: col.type, type: trinoColumnType(col.type) })),
          )
        }
        for (const values of page.data ?? []) {
          collected.rows.push(toRow(collected.columns, values))
        }
      }
      return collected
    } finally {
      disarm()
    }
  }

  return {
    async query(sql: string, params: unknown[] = [], options: ResultSetOptions = {}): Promise<ResultSet> {
      const t0 = Date.now()
      try {
        const finalSql = params.length > 0 ? bindParams(sql, params) : sql
        const { columns, rows } = await collect(finalSql)
        return new ResultSet(new ArrayRowSource(rows, columns), {
          ...options,
          debugLog: [
            ...(options.debugLog ?? []),
            debugEntry('execution', `Executed on trino (${String(rows.length)} rows)`, Date.now() - t0, {
              sql: finalSql,
            }),
          ],
        })
      } catch (err) {
        if (err instanceof SourceError) throw err
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new SourceError({ code: 'QUERY_FAILED', engine: 'trino', sql, params: [...params], cause }, cause)
      }
    },

    async ping(): Promise<void> {
      try {
        await collect('SELECT 1')
      } catch (_err) {
        throw new SourceError({ code: 'CONNECTION_FAILED', engine: 'trino', url: config.server })
      }
    },

    async close(): Promise<void> {
      // trino-client is HTTP-based, no persistent connection to close
    },
  }
}

function toRow(columns: readonly ColumnMeta[], values: readonly unknown[]): Row {
  return Object.fromEntries(columns.map((col, i): [string, RowValue] => [col.name, toRowValue(values[i])]))
}

export type { QuerySource } from '@rowshape/core'
export { trinoColumnType } from './types.js'
