/**
 * Go Declaration Tree
 *
 * The subset of a Go file the generator reads: the package clause and the
 * top-level declarations. Function bodies and value initialisers are skipped
 * by the parser and never appear here.
 */

export interface Position {
  line: number
  column: number
}

export interface SourceFile {
  path: string
  packageName: string
  imports: ImportSpec[]
  decls: Decl[]
}

export type Decl = GenDecl | FuncDecl

/**
 * `import`, `const`, `type` or `var` declaration, single or grouped
 */
export interface GenDecl {
  kind: 'gen'
  tok: 'import' | 'const' | 'type' | 'var'
  /** Whether the specs were written inside `( ... )` */
  grouped: boolean
  specs: Spec[]
  pos: Position
}

export interface FuncDecl {
  kind: 'func'
  name: string
  /** Receiver type text, e.g. `*PostgresRepository` */
  receiver?: string
  pos: Position
}

export type Spec = ImportSpec | TypeSpec | ValueSpec

export interface ImportSpec {
  kind: 'import'
  alias?: string
  path: string
  pos: Position
}

export interface TypeSpec {
  kind: 'type'
  name: string
  /** `type A = B` */
  alias: boolean
  typeParams: TypeParam[]
  type: TypeExpr
  pos: Position
}

export interface TypeParam {
  name: string
  constraint: TypeExpr
}

export interface ValueSpec {
  kind: 'value'
  names: string[]
  pos: Position
}

export type TypeExpr =
  | IdentType
  | SelectorType
  | PointerType
  | ArrayType
  | MapType
  | ChanType
  | FuncType
  | StructType
  | InterfaceType
  | GenericType

export interface IdentType {
  kind: 'ident'
  name: string
}

/** Package-qualified type, `pkg.Name` */
export interface SelectorType {
  kind: 'selector'
  pkg: string
  name: string
}

export interface PointerType {
  kind: 'pointer'
  elem: TypeExpr
}

/** Slice when `length` is absent */
export interface ArrayType {
  kind: 'array'
  length?: string
  elem: TypeExpr
}

export interface MapType {
  kind: 'map'
  key: TypeExpr
  value: TypeExpr
}

export interface ChanType {
  kind: 'chan'
  dir: 'both' | 'send' | 'recv'
  elem: TypeExpr
}

export interface FuncType {
  kind: 'func'
}

export interface StructType {
  kind: 'struct'
  fields: FieldDecl[]
}

export interface InterfaceType {
  kind: 'interface'
}

/** Instantiated generic type, `List[int]` */
export interface GenericType {
  kind: 'generic'
  base: TypeExpr
  args: TypeExpr[]
}

export interface FieldDecl {
  /** Empty for an embedded field */
  names: string[]
  type: TypeExpr
  /** Raw tag literal including its quotes or backticks */
  tag?: string
  pos: Position
}

/**
 * Render a type expression back to Go syntax
 */
export function formatTypeExpr(type: TypeExpr): string {
  switch (type.kind) {
    case 'ident':
      return type.name
    case 'selector':
      return `${type.pkg}.${type.name}`
    case 'pointer':
      return `*${formatTypeExpr(type.elem)}`
    case 'array':
      return `[${type.length ?? ''}]${formatTypeExpr(type.elem)}`
    case 'map':
      return `map[${formatTypeExpr(type.key)}]${formatTypeExpr(type.value)}`
    case 'chan':
      if (type.dir === 'send') return `chan<- ${formatTypeExpr(type.elem)}`
      if (type.dir === 'recv') return `<-chan ${formatTypeExpr(type.elem)}`
      return `chan ${formatTypeExpr(type.elem)}`
    case 'func':
      return 'func(...)'
    case 'struct':
      return 'struct{...}'
    case 'interface':
      return 'interface{...}'
    case 'generic':
      return `${formatTypeExpr(type.base)}[${type.args.map(formatTypeExpr).join(', ')}]`
  }
}
