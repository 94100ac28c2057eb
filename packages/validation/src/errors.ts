// --- Base Error ---

export class RowShapeError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RowShapeError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Descriptor Error ---

export type DescriptorErrorCode = 'UNKNOWN_DESCRIPTOR_COLUMN' | 'INVALID_DESCRIPTOR'

export class DescriptorError extends RowShapeError {
  declare readonly code: DescriptorErrorCode
  readonly descriptor: string
  readonly columns: readonly string[]

  constructor(code: DescriptorErrorCode, descriptor: string, columns: readonly string[], message?: string | undefined) {
    super(code, message ?? defaultDescriptorMessage(code, columns))
    this.name = 'DescriptorError'
    this.descriptor = descriptor
    this.columns = columns
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      descriptor: this.descriptor,
      columns: this.columns,
    }
  }
}

// --- Argument Error ---

export type ArgumentErrorCode = 'PAIRS_ARGUMENTS' | 'TOO_FEW_COLUMNS' | 'UNKNOWN_COLUMN'

export interface ArgumentErrorDetails {
  role?: 'key' | 'value' | undefined
  column?: string | undefined
  available?: readonly string[] | undefined
}

export class ArgumentError extends RowShapeError {
  declare readonly code: ArgumentErrorCode
  readonly details: ArgumentErrorDetails

  constructor(code: ArgumentErrorCode, message: string, details: ArgumentErrorDetails = {}) {
    super(code, message)
    this.name = 'ArgumentError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Source Error ---

export type SourceEngine = 'memory' | 'postgres' | 'clickhouse' | 'trino'

export type SourceErrorDetails =
  | {
      code: 'QUERY_FAILED'
      engine: SourceEngine
      sql: string
      params: unknown[]
      cause?: Error | undefined
    }
  | {
      code: 'CONNECTION_FAILED'
      engine: SourceEngine
      url?: string | undefined
    }

export class SourceError extends RowShapeError {
  declare readonly code: 'QUERY_FAILED' | 'CONNECTION_FAILED'
  readonly details: SourceErrorDetails

  constructor(details: SourceErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultSourceMessage(details), cause ? { cause } : undefined)
    this.name = 'SourceError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeSourceDetails(this.details),
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof RowShapeError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeSourceDetails(details: SourceErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function quoteList(columns: readonly string[]): string {
  return columns.map((c) => `'${c}'`).join(', ')
}

function defaultDescriptorMessage(code: DescriptorErrorCode, columns: readonly string[]): string {
  switch (code) {
    case 'UNKNOWN_DESCRIPTOR_COLUMN':
      return columns.length === 1
        ? `Unknown column ${quoteList(columns)} in associative descriptor`
        : `Unknown columns ${quoteList(columns)} in associative descriptor`
    case 'INVALID_DESCRIPTOR':
      return 'Associative descriptor produces incompatible node kinds'
  }
}

function defaultSourceMessage(details: SourceErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return `Query failed on ${details.engine} source`
    case 'CONNECTION_FAILED':
      return `Connection to ${details.engine} source failed`
  }
}
