import { DescriptorError } from './errors.js'

export const WILDCARD_TOKEN = '*'
export const RECORD_TOKEN = '#'
export const DESCRIPTOR_SEPARATOR = ','

export interface AssocDescriptor {
  readonly source: string
  readonly tokens: readonly string[]
}

/**
 * Split an associative descriptor such as `cat,*,id` into tokens.
 * Surrounding whitespace is trimmed; empty tokens are kept and later fail
 * column validation like any other unknown name.
 */
export function parseDescriptor(source: string): AssocDescriptor {
  const tokens = source.split(DESCRIPTOR_SEPARATOR).map((t) => t.trim())
  return { source, tokens }
}

export function isColumnToken(token: string): boolean {
  return token !== WILDCARD_TOKEN && token !== RECORD_TOKEN
}

/**
 * Every non-reserved token must name a column. Collects all unknown names
 * before throwing.
 */
export function validateDescriptor(descriptor: AssocDescriptor, columns: Iterable<string>): void {
  const known = new Set(columns)
  const unknown: string[] = []
  for (const token of descriptor.tokens) {
    if (isColumnToken(token) && !known.has(token) && !unknown.includes(token)) {
      unknown.push(token)
    }
  }
  if (unknown.length > 0) {
    throw new DescriptorError('UNKNOWN_DESCRIPTOR_COLUMN', descriptor.source, unknown)
  }
}

/** Single plain column: materialized as a flat key → row map. */
export function isFlatDescriptor(descriptor: AssocDescriptor): boolean {
  const [first] = descriptor.tokens
  return descriptor.tokens.length === 1 && first !== undefined && isColumnToken(first)
}

/** Tokens the tree walk consumes: a single trailing record token is dropped. */
export function walkTokens(descriptor: AssocDescriptor): readonly string[] {
  const last = descriptor.tokens.length - 1
  if (last >= 0 && descriptor.tokens[last] === RECORD_TOKEN) {
    return descriptor.tokens.slice(0, last)
  }
  return descriptor.tokens
}
