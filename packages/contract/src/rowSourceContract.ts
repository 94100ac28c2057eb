import type { Row, RowSource } from '@rowshape/core'
import { describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface RowSourceContractConfig {
  /** Rows the factory's source yields, in order. Needs at least two. */
  readonly rows: readonly Row[]
  /** Column names `discoverColumns()` reports, in order. */
  readonly columns: readonly string[]
  /** Set when the source cannot reposition; seek tests then only check it does not throw. */
  readonly seekable?: boolean | undefined
}

// ── describeRowSourceContract ──────────────────────────────────

export function describeRowSourceContract(
  name: string,
  factory: () => RowSource,
  config: RowSourceContractConfig,
): void {
  const seekable = config.seekable !== false

  describe(`RowSourceContract: ${name}`, () => {
    it('C100: fetchNext() yields every row in order, then null', () => {
      const source = factory()
      const fetched: Row[] = []
      let row: Row | null
      while ((row = source.fetchNext()) !== null) {
        fetched.push(row)
      }
      expect(fetched).toEqual(config.rows)
      expect(source.fetchNext()).toBeNull()
    })

    it('C101: fetchNext() hands out a fresh object per row', () => {
      const source = factory()
      const first = source.fetchNext()
      expect(first).not.toBeNull()
      if (first === null || !seekable) return
      for (const key of Object.keys(first)) first[key] = null
      expect(source.seek(0)).toBe(true)
      expect(source.fetchNext()).toEqual(config.rows[0])
    })

    it('C102: rowCount() reports the number of rows', () => {
      expect(factory().rowCount()).toBe(config.rows.length)
    })

    it('C103: seek() repositions within range', () => {
      const source = factory()
      const ok = source.seek(1)
      if (!seekable) {
        expect(typeof ok).toBe('boolean')
        return
      }
      expect(ok).toBe(true)
      expect(source.fetchNext()).toEqual(config.rows[1])
    })

    it('C104: seek() outside the result returns false', () => {
      const source = factory()
      expect(source.seek(config.rows.length)).toBe(false)
      expect(source.seek(-1)).toBe(false)
    })

    it('C105: discoverColumns() lists column names in order', () => {
      const columns = factory().discoverColumns()
      expect(columns.map((c) => c.name)).toEqual(config.columns)
      for (const column of columns) {
        expect(typeof column.nativeType).toBe('string')
      }
    })

    it('C106: release() is idempotent', () => {
      const source = factory()
      expect(() => source.release()).not.toThrow()
      expect(() => source.release()).not.toThrow()
    })

    it('C107: released source yields no rows', () => {
      const source = factory()
      source.release()
      expect(source.fetchNext()).toBeNull()
    })
  })
}
