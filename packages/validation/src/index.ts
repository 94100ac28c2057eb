// Descriptor
export type { AssocDescriptor } from './descriptor.js'
export {
  DESCRIPTOR_SEPARATOR,
  isColumnToken,
  isFlatDescriptor,
  parseDescriptor,
  RECORD_TOKEN,
  validateDescriptor,
  walkTokens,
  WILDCARD_TOKEN,
} from './descriptor.js'

// Errors
export type {
  ArgumentErrorCode,
  ArgumentErrorDetails,
  DescriptorErrorCode,
  SourceEngine,
  SourceErrorDetails,
} from './errors.js'
export { ArgumentError, DescriptorError, RowShapeError, SourceError } from './errors.js'

// Pairs
export type { PairsPlan } from './pairs.js'
export { resolvePairsColumns } from './pairs.js'

// Types: columns
export type { ColumnMeta, ColumnType, ColumnTypeTag, ConversionTable } from './types/columns.js'
export { COLUMN_TYPES, isColumnType } from './types/columns.js'
// Types: rows
export type {
  AssocBranch,
  AssocList,
  AssocNode,
  FetchAllResult,
  PairsMap,
  Row,
  RowKey,
  RowValue,
  TreeRecord,
} from './types/row.js'
