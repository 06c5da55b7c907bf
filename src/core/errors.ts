/**
 * Error hierarchy
 *
 * Every failure the generator can raise. Library code throws these and never
 * catches them; the CLI reports the first one and exits.
 */

export type ErrorCode =
  | 'SOURCE_SYNTAX'
  | 'STRUCTURE_SHAPE'
  | 'UNSUPPORTED_FIELD_TYPE'
  | 'TAG_PARSE'
  | 'MISSING_COLUMN'
  | 'MISSING_PRIMARY_KEY'
  | 'EMPTY_UPDATE_SET'
  | 'OUTPUT_WRITE'
  | 'CONFIG'

export interface ErrorContext {
  file?: string
  structure?: string
  field?: string
  [key: string]: unknown
}

/**
 * Base error for repogen
 */
export class RepogenError extends Error {
  public readonly code: ErrorCode
  public readonly context: ErrorContext

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RepogenError'
    this.code = code
    this.context = context
  }
}

/**
 * Malformed Go source text, positioned at `file:line:column`
 */
export class SourceSyntaxError extends RepogenError {
  public readonly line: number
  public readonly column: number

  constructor(message: string, file: string, line: number, column: number) {
    super(`${file}:${line}:${column}: ${message}`, 'SOURCE_SYNTAX', { file, line, column })
    this.name = 'SourceSyntaxError'
    this.line = line
    this.column = column
  }
}

/**
 * A type declaration that cannot be read as a struct with named fields
 */
export class StructureShapeError extends RepogenError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'STRUCTURE_SHAPE', context)
    this.name = 'StructureShapeError'
  }
}

export class UnsupportedFieldTypeError extends RepogenError {
  public readonly shape: string

  constructor(structure: string, field: string, shape: string) {
    super(
      `${structure}.${field}: unsupported field type shape "${shape}" (expected a named or package-qualified type)`,
      'UNSUPPORTED_FIELD_TYPE',
      { structure, field, shape }
    )
    this.name = 'UnsupportedFieldTypeError'
    this.shape = shape
  }
}

export class TagParseError extends RepogenError {
  public readonly offset: number

  constructor(message: string, offset: number, context: ErrorContext = {}) {
    const where = context.structure && context.field ? `${context.structure}.${context.field}: ` : ''
    super(`${where}malformed struct tag at offset ${offset}: ${message}`, 'TAG_PARSE', { ...context, offset })
    this.name = 'TagParseError'
    this.offset = offset
  }
}

export class MissingColumnError extends RepogenError {
  constructor(structure: string, field: string) {
    super(`${structure}.${field}: missing "column" tag`, 'MISSING_COLUMN', { structure, field })
    this.name = 'MissingColumnError'
  }
}

export class MissingPrimaryKeyError extends RepogenError {
  constructor(structure: string, operation: string) {
    super(
      `${structure}: ${operation} needs at least one field tagged primary:"true"`,
      'MISSING_PRIMARY_KEY',
      { structure, operation }
    )
    this.name = 'MissingPrimaryKeyError'
  }
}

export class EmptyUpdateSetError extends RepogenError {
  constructor(structure: string) {
    super(
      `${structure}: every field is a primary key, nothing left to update`,
      'EMPTY_UPDATE_SET',
      { structure }
    )
    this.name = 'EmptyUpdateSetError'
  }
}

export class OutputWriteError extends RepogenError {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`failed to write ${path}: ${reason}`, 'OUTPUT_WRITE', { file: path }, { cause })
    this.name = 'OutputWriteError'
  }
}

export class ConfigError extends RepogenError {
  public readonly issues: string[]

  constructor(issues: string[]) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`, 'CONFIG', { issues })
    this.name = 'ConfigError'
    this.issues = issues
  }
}
