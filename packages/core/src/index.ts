// Re-export all types from validation package
export type {
  ArgumentErrorCode,
  ArgumentErrorDetails,
  AssocBranch,
  AssocDescriptor,
  AssocList,
  AssocNode,
  ColumnMeta,
  ColumnType,
  ColumnTypeTag,
  ConversionTable,
  DescriptorErrorCode,
  FetchAllResult,
  PairsMap,
  PairsPlan,
  Row,
  RowKey,
  RowValue,
  SourceEngine,
  SourceErrorDetails,
  TreeRecord,
} from '@rowshape/validation'
// Re-export validation functions and classes
export {
  ArgumentError,
  COLUMN_TYPES,
  DescriptorError,
  isColumnType,
  parseDescriptor,
  RECORD_TOKEN,
  RowShapeError,
  resolvePairsColumns,
  SourceError,
  validateDescriptor,
  WILDCARD_TOKEN,
} from '@rowshape/validation'
// Conversion
export type { ConversionLookup } from './conversion/convert.js'
export { convert, convertRow, parseIntegerText } from './conversion/convert.js'
// Debug
export type { DebugLogEntry, DebugPhase } from './debug/logger.js'
export { debugEntry, withDebugLog } from './debug/logger.js'
// Result Set
export type { IterateOptions, ResultSetOptions } from './result/resultSet.js'
export { ResultSet } from './result/resultSet.js'
// Scoped release
export { withResultSet } from './scope.js'
// Sources
export { ArrayRowSource } from './sources/arrayRowSource.js'
export { inferColumnType, nativeTypeOf, normalizeRow, toRowKey, toRowValue } from './sources/normalize.js'
// Associative Trees
export { AssocTreeBuilder, buildAssocTree } from './tree/assocTree.js'
// Public interfaces
export type { QuerySource, RowSource } from './types/interfaces.js'
