import { describe, expect, it } from 'vitest'
import { ArgumentError, DescriptorError, RowShapeError, SourceError } from '../src/errors.js'

describe('RowShapeError', () => {
  it('has code and message', () => {
    const err = new RowShapeError('TEST_CODE', 'test message')
    expect(err.code).toBe('TEST_CODE')
    expect(err.message).toBe('test message')
    expect(err.name).toBe('RowShapeError')
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(RowShapeError)
  })

  it('toJSON() returns code and message', () => {
    const err = new RowShapeError('X', 'msg')
    expect(err.toJSON()).toEqual({ code: 'X', message: 'msg' })
  })

  it('toJSON() serializes cause chain', () => {
    const root = new Error('root cause')
    const mid = new RowShapeError('MID', 'mid', { cause: root })
    const top = new RowShapeError('TOP', 'top', { cause: mid })
    expect(top.toJSON().cause).toEqual({
      code: 'MID',
      message: 'mid',
      cause: { message: 'root cause', name: 'Error' },
    })
  })

  it('toJSON() omits cause when undefined', () => {
    expect(new RowShapeError('X', 'msg').toJSON()).not.toHaveProperty('cause')
  })
})

describe('DescriptorError', () => {
  it('names a single unknown column', () => {
    const err = new DescriptorError('UNKNOWN_DESCRIPTOR_COLUMN', 'id,bad', ['bad'])
    expect(err.code).toBe('UNKNOWN_DESCRIPTOR_COLUMN')
    expect(err.message).toBe("Unknown column 'bad' in associative descriptor")
    expect(err.name).toBe('DescriptorError')
    expect(err).toBeInstanceOf(RowShapeError)
  })

  it('names several unknown columns', () => {
    const err = new DescriptorError('UNKNOWN_DESCRIPTOR_COLUMN', 'a,b', ['a', 'b'])
    expect(err.message).toBe("Unknown columns 'a', 'b' in associative descriptor")
  })

  it('toJSON() includes descriptor and columns', () => {
    const err = new DescriptorError('INVALID_DESCRIPTOR', 'a,#', [])
    expect(err.toJSON()).toEqual({
      code: 'INVALID_DESCRIPTOR',
      message: 'Associative descriptor produces incompatible node kinds',
      descriptor: 'a,#',
      columns: [],
    })
  })
})

describe('ArgumentError', () => {
  it('carries details', () => {
    const err = new ArgumentError('UNKNOWN_COLUMN', "Unknown key column 'k'", { role: 'key', column: 'k' })
    expect(err.code).toBe('UNKNOWN_COLUMN')
    expect(err.name).toBe('ArgumentError')
    expect(err.toJSON()).toEqual({
      code: 'UNKNOWN_COLUMN',
      message: "Unknown key column 'k'",
      details: { role: 'key', column: 'k' },
    })
  })

  it('defaults details to an empty object', () => {
    expect(new ArgumentError('TOO_FEW_COLUMNS', 'x').details).toEqual({})
  })
})

describe('SourceError', () => {
  it('QUERY_FAILED message and cause', () => {
    const cause = new Error('relation "nope" does not exist')
    const err = new SourceError(
      { code: 'QUERY_FAILED', engine: 'postgres', sql: 'SELECT * FROM nope', params: [], cause },
      cause,
    )
    expect(err.code).toBe('QUERY_FAILED')
    expect(err.message).toBe('Query failed on postgres source')
    expect(err.cause).toBe(cause)
  })

  it('toJSON() serializes the cause inside details', () => {
    const cause = new Error('timeout')
    const err = new SourceError({ code: 'QUERY_FAILED', engine: 'trino', sql: 'SELECT 1', params: [1], cause }, cause)
    const json = err.toJSON()
    expect(json.details).toEqual({
      code: 'QUERY_FAILED',
      engine: 'trino',
      sql: 'SELECT 1',
      params: [1],
      cause: { message: 'timeout', name: 'Error' },
    })
  })

  it('CONNECTION_FAILED message', () => {
    const err = new SourceError({ code: 'CONNECTION_FAILED', engine: 'clickhouse', url: 'http://ch:8123' })
    expect(err.message).toBe('Connection to clickhouse source failed')
    expect(err.toJSON()).not.toHaveProperty('cause')
  })

  it('survives JSON.stringify()', () => {
    const err = new SourceError({ code: 'CONNECTION_FAILED', engine: 'memory' })
    const parsed = JSON.parse(JSON.stringify(err.toJSON()))
    expect(parsed.details).toEqual({ code: 'CONNECTION_FAILED', engine: 'memory' })
  })
})
