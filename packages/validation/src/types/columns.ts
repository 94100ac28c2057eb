// --- Column Types ---

export const COLUMN_TYPES = ['text', 'binary', 'bool', 'integer', 'float', 'counter', 'date', 'datetime'] as const

export type ColumnType = (typeof COLUMN_TYPES)[number]

/**
 * A conversion tag. Anything outside {@link ColumnType} is accepted and
 * leaves values untouched.
 */
export type ColumnTypeTag = ColumnType | (string & {})

export type ConversionTable = Readonly<Record<string, ColumnTypeTag>>

// --- Column Metadata ---

export interface ColumnMeta {
  readonly name: string
  /** Type name as reported by the engine, e.g. `int4`, `Nullable(UInt64)`, `varchar(20)`. */
  readonly nativeType: string
  /** Logical type the source maps the native type to; `null` when it has no mapping. */
  readonly type: ColumnType | null
  readonly nullable?: boolean | undefined
}

export function isColumnType(tag: string): tag is ColumnType {
  return (COLUMN_TYPES as readonly string[]).includes(tag)
}
