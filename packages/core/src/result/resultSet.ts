import type {
  AssocNode,
  ColumnMeta,
  ColumnTypeTag,
  ConversionTable,
  FetchAllResult,
  PairsMap,
  Row,
  RowValue,
} from '@rowshape/validation'
import { resolvePairsColumns } from '@rowshape/validation'

import { convert, convertRow } from '../conversion/convert.js'
import type { DebugLogEntry } from '../debug/logger.js'
import { debugEntry, withDebugLog } from '../debug/logger.js'
import { toRowKey } from '../sources/normalize.js'
import { AssocTreeBuilder } from '../tree/assocTree.js'
import type { RowSource } from '../types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export interface ResultSetOptions {
  /** Record a debug log readable through `ResultSet.debugLog`. */
  readonly debug?: boolean | undefined
  /** Entries to start the debug log with, e.g. the execution of the query. Ignored unless `debug` is on. */
  readonly debugLog?: readonly DebugLogEntry[] | undefined
  /** Initial conversion table, or `true` to derive one from the source's column metadata. */
  readonly conversion?: ConversionTable | true | undefined
  /** Receives errors thrown while releasing the source; they are never rethrown. */
  readonly onReleaseError?: ((err: unknown) => void) | undefined
}

export interface IterateOptions {
  readonly offset?: number | undefined
  readonly limit?: number | undefined
}

// ── ResultSet ──────────────────────────────────────────────────

/**
 * Uniform access to the rows of one executed query.
 *
 * A result set owns a single cursor over its {@link RowSource}; every fetch,
 * bulk read and iterator advances that same cursor, so interleaving them
 * reads rows destructively. Not safe for concurrent use.
 */
export class ResultSet implements Iterable<Row> {
  private readonly source: RowSource
  private readonly debug: boolean
  private readonly log: DebugLogEntry[]
  private readonly onReleaseError: ((err: unknown) => void) | undefined
  private conversion = new Map<string, ColumnTypeTag>()
  private meta: Map<string, ColumnMeta> | undefined
  private cursor = 0
  private isReleased = false

  constructor(source: RowSource, options: ResultSetOptions = {}) {
    this.source = source
    this.debug = options.debug === true
    this.log = this.debug && options.debugLog !== undefined ? [...options.debugLog] : []
    this.onReleaseError = options.onReleaseError
    if (options.conversion === true) {
      this.setConversion(true)
    } else if (options.conversion !== undefined) {
      this.setConversion(options.conversion)
    }
  }

  // ── Cursor ───────────────────────────────────────────────────

  /** Offset of the next row to be fetched. */
  get position(): number {
    return this.cursor
  }

  get released(): boolean {
    return this.isReleased
  }

  get debugLog(): readonly DebugLogEntry[] {
    return this.log
  }

  seek(position: number): boolean {
    if (this.isReleased) return false
    const ok = this.source.seek(position)
    if (ok) this.cursor = position
    return ok
  }

  rowCount(): number {
    return this.source.rowCount()
  }

  count(): number {
    return this.rowCount()
  }

  // ── Fetch ────────────────────────────────────────────────────

  /** Next row with conversions applied, or `null` once the rows are exhausted. */
  fetchRow(): Row | null {
    const row = this.next()
    if (row === null) return null
    return this.conversion.size > 0 ? convertRow(row, this.conversion) : row
  }

  /** First column of the next row, or `undefined` once the rows are exhausted. */
  fetchScalar(): RowValue | undefined {
    const row = this.next()
    if (row === null) return undefined
    const [first] = this.columnsOf(row)
    if (first === undefined) return null
    const value = row[first] ?? null
    const tag = this.conversion.get(first)
    return tag !== undefined ? convert(value, tag) : value
  }

  // ── Bulk ─────────────────────────────────────────────────────

  /**
   * Every row from the start. A single-column result collapses to the list
   * of that column's values.
   */
  fetchAllRows(): FetchAllResult {
    return this.materialize('fetchAllRows', (count) => {
      this.rewind()
      let row = this.fetchRow()
      if (row === null) return []

      const columns = this.columnsOf(row)
      const [only] = columns
      if (columns.length === 1 && only !== undefined) {
        const values: RowValue[] = []
        do {
          values.push(row[only] ?? null)
          count()
        } while ((row = this.fetchRow()) !== null)
        return values
      }

      const rows: Row[] = []
      do {
        rows.push(row)
        count()
      } while ((row = this.fetchRow()) !== null)
      return rows
    })
  }

  /**
   * Key → value map of two columns. Called with neither column the first two
   * are used; with only `value` the result is that column's values in order.
   * A repeated key keeps the last value.
   */
  fetchPairs(): PairsMap
  fetchPairs(key: undefined, value: string): RowValue[]
  fetchPairs(key: string, value: string): PairsMap
  fetchPairs(key?: string | undefined, value?: string | undefined): PairsMap | RowValue[]
  fetchPairs(key?: string | undefined, value?: string | undefined): PairsMap | RowValue[] {
    return this.materialize('fetchPairs', (count) => {
      this.rewind()
      let row = this.fetchRow()
      if (row === null) return key === undefined && value !== undefined ? [] : new Map()

      const plan = resolvePairsColumns(this.columnsOf(row), key, value)

      if (plan.kind === 'list') {
        const values: RowValue[] = []
        do {
          values.push(row[plan.value] ?? null)
          count()
        } while ((row = this.fetchRow()) !== null)
        return values
      }

      const pairs: PairsMap = new Map()
      do {
        const k = toRowKey(row[plan.key] ?? null)
        pairs.delete(k)
        pairs.set(k, row[plan.value] ?? null)
        count()
      } while ((row = this.fetchRow()) !== null)
      return pairs
    })
  }

  /**
   * Nested structure shaped by an associative descriptor such as `cat,*` or
   * `id,#,tag`. Descriptor columns are checked against the first row before
   * anything is built.
   */
  fetchAssocTree(descriptor: string): AssocNode {
    return this.materialize('fetchAssocTree', (count) => {
      const builder = new AssocTreeBuilder(descriptor)
      this.rewind()
      let row: Row | null
      while ((row = this.fetchRow()) !== null) {
        builder.add(row)
        count()
      }
      return builder.result()
    })
  }

  // ── Conversion ───────────────────────────────────────────────

  /** Derive the table from the source's column metadata. */
  setConversion(autodetect: true): void
  /** Replace the whole table. */
  setConversion(table: ConversionTable): void
  /** Set, or with `null` remove, one column's tag. */
  setConversion(column: string, tag: ColumnTypeTag | null): void
  setConversion(target: true | ConversionTable | string, tag?: ColumnTypeTag | null): void {
    if (target === true) {
      const table = new Map<string, ColumnTypeTag>()
      for (const meta of this.metadata().values()) {
        if (meta.type !== null) table.set(meta.name, meta.type)
      }
      this.conversion = table
    } else if (typeof target === 'string') {
      if (tag === null || tag === undefined) {
        this.conversion.delete(target)
      } else {
        this.conversion.set(target, tag)
      }
    } else {
      this.conversion = new Map(Object.entries(target))
    }
  }

  getConversion(column: string): ColumnTypeTag | undefined {
    return this.conversion.get(column)
  }

  // ── Metadata ─────────────────────────────────────────────────

  fieldNames(): string[] {
    return [...this.metadata().keys()]
  }

  fieldMeta(name: string): ColumnMeta | undefined {
    return this.metadata().get(name)
  }

  // ── Iteration ────────────────────────────────────────────────

  /**
   * Lazily yields rows starting at `offset` (default 0), at most `limit` of
   * them. Shares the cursor with the fetch methods and cannot be restarted.
   */
  *rows(options: IterateOptions = {}): Generator<Row, void, undefined> {
    const offset = options.offset ?? 0
    const limit = options.limit
    if (limit !== undefined && limit <= 0) return

    if (!this.trySeek(offset)) {
      // no seek support: skip forward from wherever the cursor is
      for (let skipped = 0; skipped < offset; skipped++) {
        if (this.next() === null) return
      }
    }

    let yielded = 0
    let row: Row | null
    while ((limit === undefined || yielded < limit) && (row = this.fetchRow()) !== null) {
      yielded++
      yield row
    }
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows()
  }

  // ── Release ──────────────────────────────────────────────────

  /** Release the underlying source. Safe to call any number of times; never throws. */
  release(): void {
    if (this.isReleased) return
    this.isReleased = true
    try {
      this.source.release()
      if (this.debug) this.log.push(debugEntry('release', 'Released', 0))
    } catch (err) {
      if (this.debug) this.log.push(debugEntry('release', 'Release failed', 0, { error: describeError(err) }))
      this.onReleaseError?.(err)
    }
  }

  // ── Internals ────────────────────────────────────────────────

  private next(): Row | null {
    if (this.isReleased) return null
    const row = this.source.fetchNext()
    if (row !== null) this.cursor++
    return row
  }

  /**
   * Columns of `row` in select order. Object key order would put
   * integer-like names such as `"2024"` first.
   */
  private columnsOf(row: Row): string[] {
    const described = [...this.metadata().keys()].filter((name) => Object.hasOwn(row, name))
    if (described.length === 0) return Object.keys(row)
    const seen = new Set(described)
    return [...described, ...Object.keys(row).filter((name) => !seen.has(name))]
  }

  private rewind(): void {
    this.trySeek(0)
  }

  /** Best-effort seek: a refusal or a throw leaves the cursor where it was. */
  private trySeek(position: number): boolean {
    if (this.isReleased) return false
    try {
      if (this.seek(position)) return true
      if (this.debug) {
        this.log.push(debugEntry('rewind', `Seek to ${String(position)} refused, reading remaining rows`, 0))
      }
    } catch (err) {
      if (this.debug) {
        this.log.push(
          debugEntry('rewind', `Seek to ${String(position)} failed, reading remaining rows`, 0, {
            error: describeError(err),
          }),
        )
      }
    }
    return false
  }

  private metadata(): Map<string, ColumnMeta> {
    if (this.meta === undefined) {
      this.meta = withDebugLog(
        this.debug,
        this.log,
        'metadata',
        (columns: Map<string, ColumnMeta>) => `Discovered ${String(columns.size)} columns`,
        () => new Map(this.source.discoverColumns().map((c): [string, ColumnMeta] => [c.name, c])),
      )
    }
    return this.meta
  }

  private materialize<T>(name: string, fn: (count: () => void) => T): T {
    let rows = 0
    return withDebugLog(
      this.debug,
      this.log,
      'materialization',
      () => `${name} (${String(rows)} rows)`,
      () =>
        fn(() => {
          rows++
        }),
    )
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
