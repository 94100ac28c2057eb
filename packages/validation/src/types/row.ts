// --- Row ---

/** A single column value as handed out by a row source. */
export type RowValue = string | number | bigint | boolean | Date | Uint8Array | null

/** One fetched record, column name → value. */
export type Row = Record<string, RowValue>

/** A row value normalised for use as a map key. */
export type RowKey = string | number | bigint | boolean | null

// --- Materialized Tree ---

/** Value-keyed branch level. */
export interface AssocBranch extends Map<RowKey, AssocNode> {}

/** Index-keyed branch level produced by the `*` token. */
export type AssocList = AssocNode[]

/**
 * A row stored in the tree. Below a `#` token one of its columns holds a
 * child branch instead of the column's value.
 */
export interface TreeRecord {
  [column: string]: RowValue | AssocNode
}

export type AssocNode = AssocBranch | AssocList | TreeRecord

// --- Pairs ---

export type PairsMap = Map<RowKey, RowValue>

export type FetchAllResult = Row[] | RowValue[]
