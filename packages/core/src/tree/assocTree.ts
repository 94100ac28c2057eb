import type {
  AssocBranch,
  AssocDescriptor,
  AssocList,
  AssocNode,
  Row,
  RowKey,
  RowValue,
  TreeRecord,
} from '@rowshape/validation'
import {
  DescriptorError,
  isFlatDescriptor,
  parseDescriptor,
  RECORD_TOKEN,
  validateDescriptor,
  walkTokens,
  WILDCARD_TOKEN,
} from '@rowshape/validation'

import { toRowKey } from '../sources/normalize.js'

// ── Slots ──────────────────────────────────────────────────────

/** Where the walk currently stands: a position a node can be read from or written to. */
type Slot =
  | { readonly kind: 'root' }
  | { readonly kind: 'branch'; readonly branch: AssocBranch; readonly key: RowKey }
  | { readonly kind: 'list'; readonly list: AssocList; readonly index: number }
  | { readonly kind: 'record'; readonly record: TreeRecord; readonly column: string }

const ROOT: Slot = { kind: 'root' }

function isBranch(value: RowValue | AssocNode | undefined): value is AssocBranch {
  return value instanceof Map
}

function isList(value: RowValue | AssocNode | undefined): value is AssocList {
  return Array.isArray(value)
}

function isRecord(value: RowValue | AssocNode | undefined): value is TreeRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Map) &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  )
}

/** `null` marks a record column prepared for a child branch. */
function isEmpty(value: RowValue | AssocNode | undefined): value is null | undefined {
  return value === undefined || value === null
}

// ── AssocTreeBuilder ───────────────────────────────────────────

/**
 * Folds rows one at a time into a nested structure shaped by an associative
 * descriptor:
 *
 * - `col`: map level keyed by the row's value of `col`
 * - `*`:   list level, one new entry per row
 * - `#`:   the row itself, continuing into the column named by the next token
 *
 * `a,*,b,#,c` builds `tree.get(a)[i].get(b).c.get(c) = row`.
 * Nothing beyond the current row is buffered.
 */
export class AssocTreeBuilder {
  private readonly descriptor: AssocDescriptor
  private readonly tokens: readonly string[]
  private readonly flat: boolean
  private root: AssocNode | undefined
  private validated = false
  private count = 0

  constructor(descriptor: string | AssocDescriptor) {
    this.descriptor = typeof descriptor === 'string' ? parseDescriptor(descriptor) : descriptor
    this.flat = isFlatDescriptor(this.descriptor)
    this.tokens = walkTokens(this.descriptor)
  }

  /** Number of rows folded so far. */
  get rowCount(): number {
    return this.count
  }

  add(row: Row): void {
    if (!this.validated) {
      validateDescriptor(this.descriptor, Object.keys(row))
      this.validated = true
    }
    this.count++

    if (this.flat) {
      this.addFlat(row)
    } else {
      this.walk(row)
    }
  }

  result(): AssocNode {
    return this.root ?? new Map()
  }

  // Fast path for a single column: last row wins for a repeated key.
  private addFlat(row: Row): void {
    const [column] = this.descriptor.tokens
    if (column === undefined) return
    const branch = this.ensureBranch(ROOT, -1)
    branch.set(toRowKey(row[column] ?? null), row)
  }

  private walk(row: Row): void {
    let slot: Slot = ROOT

    for (const [i, token] of this.tokens.entries()) {
      if (token === WILDCARD_TOKEN) {
        const list = this.ensureList(slot, i)
        slot = { kind: 'list', list, index: list.length }
      } else if (token === RECORD_TOKEN) {
        slot = this.landRecord(slot, row, this.tokens[i + 1], i)
      } else {
        const branch = this.ensureBranch(slot, i)
        slot = { kind: 'branch', branch, key: toRowKey(row[token] ?? null) }
      }
    }

    // build leaf; the first row to reach a path keeps it
    if (isEmpty(this.read(slot))) {
      this.write(slot, row)
    }
  }

  private landRecord(slot: Slot, row: Row, next: string | undefined, level: number): Slot {
    const current = this.read(slot)
    let record: TreeRecord
    if (isEmpty(current)) {
      record = { ...row }
      if (next !== undefined) record[next] = null
      this.write(slot, record)
    } else if (isRecord(current)) {
      record = current
    } else {
      throw this.kindMismatch(level)
    }
    return next === undefined ? slot : { kind: 'record', record, column: next }
  }

  private ensureBranch(slot: Slot, level: number): AssocBranch {
    const current = this.read(slot)
    if (isBranch(current)) return current
    if (!isEmpty(current)) throw this.kindMismatch(level)
    const branch: AssocBranch = new Map()
    this.write(slot, branch)
    return branch
  }

  private ensureList(slot: Slot, level: number): AssocList {
    const current = this.read(slot)
    if (isList(current)) return current
    if (!isEmpty(current)) throw this.kindMismatch(level)
    const list: AssocList = []
    this.write(slot, list)
    return list
  }

  private read(slot: Slot): RowValue | AssocNode | undefined {
    switch (slot.kind) {
      case 'root':
        return this.root
      case 'branch':
        return slot.branch.get(slot.key)
      case 'list':
        return slot.list[slot.index]
      case 'record':
        return slot.record[slot.column]
    }
  }

  private write(slot: Slot, node: AssocNode): void {
    switch (slot.kind) {
      case 'root':
        this.root = node
        return
      case 'branch':
        slot.branch.set(slot.key, node)
        return
      case 'list':
        slot.list[slot.index] = node
        return
      case 'record':
        slot.record[slot.column] = node
        return
    }
  }

  private kindMismatch(level: number): DescriptorError {
    const token = this.tokens[level]
    return new DescriptorError(
      'INVALID_DESCRIPTOR',
      this.descriptor.source,
      token === undefined ? [] : [token],
      `Associative descriptor '${this.descriptor.source}' produces incompatible node kinds at level ${String(level)}`,
    )
  }
}

/** Build an associative tree from any row sequence. */
export function buildAssocTree(rows: Iterable<Row>, descriptor: string | AssocDescriptor): AssocNode {
  const builder = new AssocTreeBuilder(descriptor)
  for (const row of rows) {
    builder.add(row)
  }
  return builder.result()
}
