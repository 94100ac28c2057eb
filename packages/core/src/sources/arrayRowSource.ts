import type { ColumnMeta, Row } from '@rowshape/validation'

import type { RowSource } from '../types/interfaces.js'
import { inferColumnType, nativeTypeOf } from './normalize.js'

/**
 * Row source over rows already held in memory. Driver sources buffer a
 * query's rows and hand them to one of these.
 */
export class ArrayRowSource implements RowSource {
  private rows: readonly Row[]
  private readonly columns: readonly ColumnMeta[] | undefined
  private cursor = 0
  private released = false

  constructor(rows: readonly Row[], columns?: readonly ColumnMeta[] | undefined) {
    this.rows = rows
    this.columns = columns
  }

  seek(position: number): boolean {
    if (this.released || !Number.isInteger(position) || position < 0 || position >= this.rows.length) {
      return false
    }
    this.cursor = position
    return true
  }

  rowCount(): number {
    return this.rows.length
  }

  fetchNext(): Row | null {
    const row = this.released ? undefined : this.rows[this.cursor]
    if (row === undefined) return null
    this.cursor++
    return { ...row }
  }

  release(): void {
    if (this.released) return
    this.released = true
    this.rows = []
  }

  discoverColumns(): readonly ColumnMeta[] {
    if (this.columns !== undefined) return this.columns
    const [first] = this.rows
    if (first === undefined) return []
    return Object.entries(first).map(([name, value]) => ({
      name,
      nativeType: nativeTypeOf(value),
      type: inferColumnType(value),
    }))
  }
}
