import type { ColumnTypeTag, ConversionTable, Row, RowValue } from '@rowshape/validation'

/**
 * Coerce a raw value to the primitive behind a column type tag.
 *
 * `null` and `false` come back unchanged for every tag, as does any value
 * under an unknown tag.
 */
export function convert(value: RowValue, tag: ColumnTypeTag): RowValue {
  if (value === null || value === false) {
    return value
  }

  switch (tag) {
    case 'text':
    case 'binary':
      return toText(value)
    case 'bool':
      return toBool(value)
    case 'integer':
    case 'counter':
      return toInteger(value)
    case 'float':
      return toFloat(value)
    case 'date':
    case 'datetime':
      // Loose parse of whatever text the engine produced. Non-ISO strings
      // are parsed as the platform sees fit.
      return toTimestamp(value)
    default:
      return value
  }
}

export type ConversionLookup = ConversionTable | ReadonlyMap<string, ColumnTypeTag>

/** Apply a conversion table to every column of `row` it names. Inherited keys never match. */
export function convertRow(row: Row, table: ConversionLookup): Row {
  for (const column of Object.keys(row)) {
    const tag = lookupTag(table, column)
    const value = row[column]
    if (tag !== undefined && value !== undefined) {
      row[column] = convert(value, tag)
    }
  }
  return row
}

function isTagMap(table: ConversionLookup): table is ReadonlyMap<string, ColumnTypeTag> {
  return table instanceof Map
}

function lookupTag(table: ConversionLookup, column: string): ColumnTypeTag | undefined {
  if (isTagMap(table)) return table.get(column)
  return Object.hasOwn(table, column) ? table[column] : undefined
}

/**
 * Integer text (`'-42'`, `'+7'`) to a number, or to a bigint once the value
 * leaves the safe integer range.
 */
export function parseIntegerText(digits: string): number | bigint {
  const parsed = Number(digits)
  if (Number.isSafeInteger(parsed)) return parsed
  return BigInt(digits.startsWith('+') ? digits.slice(1) : digits)
}

// ── Coercions ──────────────────────────────────────────────────

const LEADING_INTEGER = /^[+-]?\d+/

function toText(value: Exclude<RowValue, null>): string {
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Uint8Array) return Buffer.from(value).toString('latin1')
  return String(value)
}

function toBool(value: Exclude<RowValue, null>): boolean {
  if (typeof value === 'string') return value !== '' && value !== '0'
  if (typeof value === 'number') return value !== 0
  if (typeof value === 'bigint') return value !== 0n
  if (value instanceof Uint8Array) return value.length > 0
  return true
}

function toInteger(value: Exclude<RowValue, null>): number | bigint {
  if (typeof value === 'string') {
    const digits = LEADING_INTEGER.exec(value.trim())?.[0]
    return digits === undefined ? 0 : parseIntegerText(digits)
  }
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : 0
  if (typeof value === 'bigint') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value instanceof Date) return epochSeconds(value.getTime())
  return 0
}

function toFloat(value: Exclude<RowValue, null>): number {
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value.trim())
    return Number.isNaN(parsed) ? 0 : parsed
  }
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value instanceof Date) return value.getTime() / 1000
  return 0
}

function toTimestamp(value: Exclude<RowValue, null>): RowValue {
  if (value instanceof Date) {
    const ms = value.getTime()
    return Number.isNaN(ms) ? null : epochSeconds(ms)
  }
  if (typeof value === 'string') {
    const ms = Date.parse(value)
    return Number.isNaN(ms) ? null : epochSeconds(ms)
  }
  return value
}

function epochSeconds(ms: number): number {
  return Math.floor(ms / 1000)
}
