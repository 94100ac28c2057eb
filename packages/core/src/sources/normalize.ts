import type { ColumnType, Row, RowKey, RowValue } from '@rowshape/validation'

/** Narrow a driver value to a {@link RowValue}. */
export function toRowValue(value: unknown): RowValue {
  if (value === undefined || value === null) return null
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    value instanceof Uint8Array
  ) {
    return value
  }
  // arrays, maps, tuples, JSON columns
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
}

/** Driver record to a {@link Row}. A column named `__proto__` stays an own property. */
export function normalizeRow(record: Record<string, unknown>): Row {
  return Object.fromEntries(
    Object.entries(record).map(([column, value]): [string, RowValue] => [column, toRowValue(value)]),
  )
}

/** Map key for a row value; dates and byte strings are keyed by content. */
export function toRowKey(value: RowValue): RowKey {
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Uint8Array) return Buffer.from(value).toString('latin1')
  return value
}

/** Logical type of a JS value, used when a source has no engine types. */
export function inferColumnType(value: RowValue): ColumnType | null {
  if (value === null) return null
  if (typeof value === 'string') return 'text'
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float'
  if (typeof value === 'bigint') return 'integer'
  if (typeof value === 'boolean') return 'bool'
  if (value instanceof Date) return 'datetime'
  return 'binary'
}

export function nativeTypeOf(value: RowValue): string {
  if (value === null) return 'null'
  if (value instanceof Date) return 'Date'
  if (value instanceof Uint8Array) return 'Uint8Array'
  return typeof value
}
