import { describe, expect, it, vi } from 'vitest'
import type { ColumnMeta, Row } from '../src/index.js'
import { ArrayRowSource, normalizeRow, ResultSet } from '../src/index.js'
import { FaultySource, ForwardOnlySource } from './fixtures/sources.js'

const users: Row[] = [
  { id: '1', name: 'ann', active: '1', joined: '2024-01-02T00:00:00Z' },
  { id: '2', name: 'bob', active: '0', joined: null },
]

const userColumns: ColumnMeta[] = [
  { name: 'id', nativeType: 'int4', type: 'integer' },
  { name: 'name', nativeType: 'varchar', type: 'text' },
  { name: 'active', nativeType: 'bool', type: 'bool' },
  { name: 'joined', nativeType: 'timestamptz', type: 'datetime' },
]

function usersResult(options?: ConstructorParameters<typeof ResultSet>[1]): ResultSet {
  return new ResultSet(new ArrayRowSource(users, userColumns), options)
}

// ── Fetch ──────────────────────────────────────────────────────

describe('fetchRow', () => {
  it('returns rows in order, then null', () => {
    const rs = usersResult()
    expect(rs.fetchRow()).toEqual(users[0])
    expect(rs.fetchRow()).toEqual(users[1])
    expect(rs.fetchRow()).toBeNull()
    expect(rs.fetchRow()).toBeNull()
  })

  it('advances the cursor by one per fetched row', () => {
    const rs = usersResult()
    expect(rs.position).toBe(0)
    rs.fetchRow()
    expect(rs.position).toBe(1)
    rs.fetchRow()
    rs.fetchRow()
    expect(rs.position).toBe(2)
  })

  it('tells a row of nulls apart from exhaustion', () => {
    const rs = new ResultSet(new ArrayRowSource([{ a: null, b: false }]))
    expect(rs.fetchRow()).toEqual({ a: null, b: false })
    expect(rs.fetchRow()).toBeNull()
  })

  it('hands out rows the caller owns', () => {
    const rs = usersResult()
    const row = rs.fetchRow()
    if (row !== null) row.name = 'changed'
    rs.seek(0)
    expect(rs.fetchRow()).toEqual(users[0])
  })
})

describe('fetchScalar', () => {
  it('returns the first column, then undefined', () => {
    const rs = usersResult()
    expect(rs.fetchScalar()).toBe('1')
    expect(rs.fetchScalar()).toBe('2')
    expect(rs.fetchScalar()).toBeUndefined()
  })

  it('converts the first column', () => {
    const rs = usersResult({ conversion: { id: 'integer' } })
    expect(rs.fetchScalar()).toBe(1)
  })

  it('returns null for a null aggregate', () => {
    const rs = new ResultSet(new ArrayRowSource([{ total: null }]))
    expect(rs.fetchScalar()).toBeNull()
    expect(rs.fetchScalar()).toBeUndefined()
  })
})

describe('seek', () => {
  it('repositions the cursor', () => {
    const rs = usersResult()
    expect(rs.seek(1)).toBe(true)
    expect(rs.position).toBe(1)
    expect(rs.fetchRow()).toEqual(users[1])
  })

  it('keeps the cursor when the source refuses', () => {
    const rs = usersResult()
    rs.fetchRow()
    expect(rs.seek(5)).toBe(false)
    expect(rs.position).toBe(1)
  })
})

describe('rowCount', () => {
  it('delegates to the source', () => {
    const rs = usersResult()
    expect(rs.rowCount()).toBe(2)
    expect(rs.count()).toBe(2)
  })
})

// ── Conversion ─────────────────────────────────────────────────

describe('setConversion', () => {
  it('converts single columns', () => {
    const rs = usersResult()
    rs.setConversion('id', 'integer')
    rs.setConversion('active', 'bool')
    expect(rs.fetchRow()).toEqual({ id: 1, name: 'ann', active: true, joined: '2024-01-02T00:00:00Z' })
    expect(rs.getConversion('id')).toBe('integer')
    expect(rs.getConversion('name')).toBeUndefined()
  })

  it('removes a column with null', () => {
    const rs = usersResult({ conversion: { id: 'integer' } })
    rs.setConversion('id', null)
    expect(rs.getConversion('id')).toBeUndefined()
    expect(rs.fetchRow()?.id).toBe('1')
  })

  it('replaces the whole table', () => {
    const table = { active: 'bool' }
    const rs = usersResult({ conversion: { id: 'integer' } })
    rs.setConversion(table)
    expect(rs.getConversion('id')).toBeUndefined()
    expect(rs.fetchRow()).toEqual({ id: '1', name: 'ann', active: true, joined: '2024-01-02T00:00:00Z' })
  })

  it('copies the table it is given', () => {
    const table: Record<string, string> = { id: 'integer' }
    const rs = usersResult()
    rs.setConversion(table)
    table.name = 'integer'
    expect(rs.getConversion('name')).toBeUndefined()
  })

  it('autodetects from column metadata', () => {
    const rs = usersResult()
    rs.setConversion(true)
    expect(rs.getConversion('joined')).toBe('datetime')
    expect(rs.fetchRow()).toEqual({ id: 1, name: 'ann', active: true, joined: 1704153600 })
    expect(rs.fetchRow()).toEqual({ id: 2, name: 'bob', active: false, joined: null })
  })

  it('skips columns without a logical type when autodetecting', () => {
    const rs = new ResultSet(
      new ArrayRowSource([{ id: '3', tags: '{a}' }], [
        { name: 'id', nativeType: 'int4', type: 'integer' },
        { name: 'tags', nativeType: '_text', type: null },
      ]),
      { conversion: true },
    )
    expect(rs.getConversion('tags')).toBeUndefined()
    expect(rs.fetchRow()).toEqual({ id: 3, tags: '{a}' })
  })

  it('ignores inherited object keys', () => {
    const rs = new ResultSet(new ArrayRowSource([{ constructor: '1', id: '2' }]))
    expect(rs.getConversion('constructor')).toBeUndefined()
    expect(rs.getConversion('hasOwnProperty')).toBeUndefined()
    expect(rs.fetchRow()).toEqual({ constructor: '1', id: '2' })
  })

  it('converts a column named __proto__', () => {
    const row = normalizeRow(JSON.parse('{"__proto__":"7","id":"1"}') as Record<string, unknown>)
    const rs = new ResultSet(new ArrayRowSource([row]))
    rs.setConversion('__proto__', 'integer')
    expect(rs.getConversion('__proto__')).toBe('integer')
    const fetched = rs.fetchRow()
    expect(fetched === null ? undefined : Object.getOwnPropertyDescriptor(fetched, '__proto__')?.value).toBe(7)
    expect(fetched?.id).toBe('1')
  })

  it('passes values under unknown tags through', () => {
    const rs = usersResult({ conversion: { id: 'uuid' } })
    expect(rs.fetchScalar()).toBe('1')
  })
})

// ── Column order ───────────────────────────────────────────────

describe('column order', () => {
  const columns: ColumnMeta[] = [
    { name: 'name', nativeType: 'varchar', type: 'text' },
    { name: '2024', nativeType: 'int4', type: 'integer' },
  ]

  function yearResult(): ResultSet {
    return new ResultSet(new ArrayRowSource([normalizeRow({ name: 'a', '2024': 5 })], columns))
  }

  it('follows the described columns for an integer-like name', () => {
    expect(yearResult().fieldNames()).toEqual(['name', '2024'])
    expect(yearResult().fetchScalar()).toBe('a')
    expect(yearResult().fetchPairs()).toEqual(new Map([['a', 5]]))
  })

  it('appends columns the source did not describe', () => {
    const rs = new ResultSet(new ArrayRowSource([{ '7': 'x', b: 'y' }], [{ name: 'b', nativeType: 'text', type: 'text' }]))
    expect(rs.fetchPairs()).toEqual(new Map([['y', 'x']]))
  })

  it('falls back to object order when nothing is described', () => {
    const rs = new ResultSet(new ArrayRowSource([{ a: 1, b: 2 }], []))
    expect(rs.fetchScalar()).toBe(1)
  })
})

// ── Metadata ───────────────────────────────────────────────────

describe('metadata', () => {
  it('lists field names in order', () => {
    expect(usersResult().fieldNames()).toEqual(['id', 'name', 'active', 'joined'])
  })

  it('returns column metadata by name', () => {
    const rs = usersResult()
    expect(rs.fieldMeta('joined')).toEqual({ name: 'joined', nativeType: 'timestamptz', type: 'datetime' })
    expect(rs.fieldMeta('missing')).toBeUndefined()
  })

  it('discovers columns once', () => {
    const source = new ArrayRowSource(users, userColumns)
    const spy = vi.spyOn(source, 'discoverColumns')
    const rs = new ResultSet(source)
    expect(spy).not.toHaveBeenCalled()
    rs.fieldNames()
    rs.fieldMeta('id')
    rs.setConversion(true)
    expect(spy).toHaveBeenCalledTimes(1)
  })
})

// ── Release ────────────────────────────────────────────────────

describe('release', () => {
  it('is idempotent', () => {
    const source = new ArrayRowSource(users)
    const spy = vi.spyOn(source, 'release')
    const rs = new ResultSet(source)
    rs.release()
    expect(() => rs.release()).not.toThrow()
    expect(rs.released).toBe(true)
    expect(spy).toHaveBeenCalledTimes(1)
  })

  it('reports exhaustion afterwards', () => {
    const rs = usersResult()
    rs.release()
    expect(rs.fetchRow()).toBeNull()
    expect(rs.fetchScalar()).toBeUndefined()
    expect(rs.seek(0)).toBe(false)
  })

  it('suppresses release failures and reports them', () => {
    const source = new FaultySource(users)
    const onReleaseError = vi.fn()
    const rs = new ResultSet(source, { onReleaseError })
    expect(() => rs.release()).not.toThrow()
    expect(() => rs.release()).not.toThrow()
    expect(source.releaseCalls).toBe(1)
    expect(onReleaseError).toHaveBeenCalledTimes(1)
    expect((onReleaseError.mock.calls[0]?.[0] as Error).message).toBe('socket already closed')
  })
})

// ── Debug log ──────────────────────────────────────────────────

describe('debugLog', () => {
  it('is empty unless debug is on', () => {
    const rs = usersResult({ debugLog: [{ timestamp: 0, phase: 'execution', message: 'x', durationMs: 0 }] })
    rs.fetchAllRows()
    rs.release()
    expect(rs.debugLog).toEqual([])
  })

  it('records metadata, materialization and release', () => {
    const rs = usersResult({ debug: true })
    rs.fieldNames()
    rs.fetchAllRows()
    rs.release()
    expect(rs.debugLog.map((e) => [e.phase, e.message])).toEqual([
      ['metadata', 'Discovered 4 columns'],
      ['materialization', 'fetchAllRows (2 rows)'],
      ['release', 'Released'],
    ])
  })

  it('records a refused rewind', () => {
    const rs = new ResultSet(new ForwardOnlySource(users), { debug: true })
    rs.fetchPairs('id', 'name')
    expect(rs.debugLog.map((e) => [e.phase, e.message])).toEqual([
      ['rewind', 'Seek to 0 refused, reading remaining rows'],
      ['metadata', 'Discovered 4 columns'],
      ['materialization', 'fetchPairs (2 rows)'],
    ])
  })

  it('records a failed rewind and a failed release', () => {
    const rs = new ResultSet(new FaultySource(users), { debug: true })
    rs.fetchAssocTree('id')
    rs.release()
    expect(rs.debugLog.map((e) => [e.phase, e.message, e.details])).toEqual([
      ['rewind', 'Seek to 0 failed, reading remaining rows', { error: 'seek not supported' }],
      ['materialization', 'fetchAssocTree (2 rows)', undefined],
      ['release', 'Release failed', { error: 'socket already closed' }],
    ])
  })

  it('keeps seeded entries first', () => {
    const seed = { timestamp: 0, phase: 'execution' as const, message: 'Executed', durationMs: 3 }
    const rs = usersResult({ debug: true, debugLog: [seed] })
    rs.release()
    expect(rs.debugLog[0]).toEqual(seed)
    expect(rs.debugLog).toHaveLength(2)
  })
})
