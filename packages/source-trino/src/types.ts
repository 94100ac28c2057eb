import type { ColumnType } from '@rowshape/core'

/** Map a Trino type signature such as `decimal(10,2)` or `timestamp(3) with time zone`. */
export function trinoColumnType(nativeType: string): ColumnType | null {
  const base = nativeType.trim().toLowerCase().replace(/\(.*$/, '').trim()
  switch (base) {
    case 'boolean':
      return 'bool'
    case 'tinyint':
    case 'smallint':
    case 'integer':
    case 'bigint':
      return 'integer'
    case 'real':
    case 'double':
    case 'decimal':
      return 'float'
    case 'varchar':
    case 'char':
    case 'uuid':
    case 'json':
      return 'text'
    case 'varbinary':
      return 'binary'
    case 'date':
      return 'date'
    case 'timestamp':
      return 'datetime'
    default:
      return null
  }
}
