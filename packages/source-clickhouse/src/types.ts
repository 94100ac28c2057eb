import type { ColumnType } from '@rowshape/core'

const WRAPPERS = /^(?:Nullable|LowCardinality)\((.*)\)$/

/** Strip `Nullable(...)` and `LowCardinality(...)`, in any nesting. */
export function unwrapClickHouseType(nativeType: string): { inner: string; nullable: boolean } {
  let inner = nativeType.trim()
  let nullable = false
  let match = WRAPPERS.exec(inner)
  while (match !== null && match[1] !== undefined) {
    if (inner.startsWith('Nullable')) nullable = true
    inner = match[1].trim()
    match = WRAPPERS.exec(inner)
  }
  return { inner, nullable }
}

export function clickHouseColumnType(nativeType: string): ColumnType | null {
  const { inner } = unwrapClickHouseType(nativeType)
  if (/^U?Int(8|16|32|64|128|256)$/.test(inner)) return 'integer'
  if (/^(Float(32|64)|BFloat16|Decimal(32|64|128|256)?\b)/.test(inner)) return 'float'
  if (inner === 'Bool') return 'bool'
  if (inner === 'String' || inner === 'UUID' || /^(FixedString|Enum(8|16))\(/.test(inner)) return 'text'
  if (inner === 'Date' || inner === 'Date32') return 'date'
  if (/^DateTime(64)?(\(|$)/.test(inner)) return 'datetime'
  return null
}
