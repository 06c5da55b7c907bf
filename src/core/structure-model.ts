/**
 * Structure Model - Core Types
 *
 * The normalized representation of a tagged Go struct. The synthesizers
 * consume this and never look at the declaration tree.
 */

/**
 * Field type, as a tagged variant over the shapes a repository method can
 * take as a parameter
 */
export type TypeRef =
  | { kind: 'named'; name: string }
  | { kind: 'qualified'; pkg: string; name: string }
  | { kind: 'unsupported'; shape: string }

/** Tag key to tag value, e.g. `{ column: 'id', primary: 'true' }` */
export type TagMap = Readonly<Record<string, string>>

export interface Field {
  /** Go field identifier */
  readonly name: string
  /** Rendered type, `int64` or `uuid.UUID` */
  readonly type: string
  readonly tags: TagMap
}

export interface Structure {
  /** Package that owns the struct; qualifies the element type in signatures */
  readonly packageName: string
  readonly tableName: string
  readonly name: string
  /** Declaration order drives placeholder numbering and column order */
  readonly fields: readonly Field[]
}

/**
 * One generated repository method
 */
export interface Method {
  readonly name: string
  /** Doc comment line, including the leading `//` */
  readonly comment: string
  /** Input parameter list text, without parentheses */
  readonly iParams: string
  /** Output parameter list text, without parentheses */
  readonly oParams: string
  /** Statement text placed verbatim inside the function */
  readonly body: string
}

/** Tag keys the generator reads */
export const COLUMN_TAG = 'column'
export const PRIMARY_TAG = 'primary'

export function isPrimary(field: Field): boolean {
  return field.tags[PRIMARY_TAG] === 'true'
}

export function renderTypeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case 'named':
      return ref.name
    case 'qualified':
      return `${ref.pkg}.${ref.name}`
    case 'unsupported':
      return ref.shape
  }
}
