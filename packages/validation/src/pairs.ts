import { ArgumentError } from './errors.js'

export type PairsPlan =
  | { readonly kind: 'map'; readonly key: string; readonly value: string }
  | { readonly kind: 'list'; readonly value: string }

/**
 * Decide which columns `fetchPairs` reads, given the first row's columns.
 *
 * - neither column: the first two columns become key and value
 * - value only: a flat list of that column
 * - both: a key → value map
 */
export function resolvePairsColumns(
  columns: readonly string[],
  key?: string | undefined,
  value?: string | undefined,
): PairsPlan {
  if (value === undefined) {
    if (key !== undefined) {
      throw new ArgumentError('PAIRS_ARGUMENTS', 'Either none or both columns must be specified', {
        role: 'key',
        column: key,
      })
    }
    const [first, second] = columns
    if (first === undefined || second === undefined) {
      throw new ArgumentError('TOO_FEW_COLUMNS', 'Result must have at least two columns', {
        available: columns,
      })
    }
    return { kind: 'map', key: first, value: second }
  }

  if (!columns.includes(value)) {
    throw new ArgumentError('UNKNOWN_COLUMN', `Unknown value column '${value}'`, {
      role: 'value',
      column: value,
      available: columns,
    })
  }

  if (key === undefined) {
    return { kind: 'list', value }
  }

  if (!columns.includes(key)) {
    throw new ArgumentError('UNKNOWN_COLUMN', `Unknown key column '${key}'`, {
      role: 'key',
      column: key,
      available: columns,
    })
  }

  return { kind: 'map', key, value }
}
