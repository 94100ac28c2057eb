import type { ColumnType } from '@rowshape/core'

/** Built-in PostgreSQL type OIDs → native name and logical type. */
const PG_TYPES: ReadonlyMap<number, readonly [string, ColumnType | null]> = new Map([
  [16, ['bool', 'bool']],
  [17, ['bytea', 'binary']],
  [18, ['char', 'text']],
  [19, ['name', 'text']],
  [20, ['int8', 'integer']],
  [21, ['int2', 'integer']],
  [23, ['int4', 'integer']],
  [25, ['text', 'text']],
  [26, ['oid', 'integer']],
  [114, ['json', 'text']],
  [700, ['float4', 'float']],
  [701, ['float8', 'float']],
  [790, ['money', 'text']],
  [1042, ['bpchar', 'text']],
  [1043, ['varchar', 'text']],
  [1082, ['date', 'date']],
  [1083, ['time', 'text']],
  [1114, ['timestamp', 'datetime']],
  [1184, ['timestamptz', 'datetime']],
  [1266, ['timetz', 'text']],
  [1700, ['numeric', 'float']],
  [2950, ['uuid', 'text']],
  [3802, ['jsonb', 'text']],
])

export function describePgType(oid: number): { nativeType: string; type: ColumnType | null } {
  const known = PG_TYPES.get(oid)
  if (known === undefined) return { nativeType: `oid:${String(oid)}`, type: null }
  return { nativeType: known[0], type: known[1] }
}
