/**
 * Structure Resolver
 *
 * Turns a parsed Go file into Structures. Only the first spec of each `type`
 * declaration is read, so in a grouped `type ( A struct{...}; B struct{...} )`
 * only A is generated.
 */

import { formatTypeExpr, type FieldDecl, type SourceFile, type TypeExpr, type TypeSpec } from '../source/ast.js'
import { StructureShapeError, UnsupportedFieldTypeError } from './errors.js'
import { parseTagLiteral } from './tag-parser.js'
import { renderTypeRef, type Field, type Structure, type TypeRef } from './structure-model.js'

export interface StructureResolverOptions {
  /** Table every generated statement targets (default: "testTable") */
  tableName?: string
}

const DEFAULT_OPTIONS: Required<StructureResolverOptions> = {
  tableName: 'testTable',
}

export class StructureResolver {
  private options: Required<StructureResolverOptions>

  constructor(options: StructureResolverOptions = {}) {
    this.options = { tableName: options.tableName ?? DEFAULT_OPTIONS.tableName }
  }

  resolve(file: SourceFile): Structure[] {
    const structures: Structure[] = []

    for (const decl of file.decls) {
      if (decl.kind !== 'gen' || decl.tok !== 'type') continue

      const spec = decl.specs[0]
      if (!spec) {
        throw new StructureShapeError(`${file.path}:${decl.pos.line}: empty type declaration group`, {
          file: file.path,
        })
      }
      if (spec.kind !== 'type') continue

      structures.push(this.resolveTypeSpec(file, spec))
    }

    return structures
  }

  resolveTypeSpec(file: SourceFile, spec: TypeSpec): Structure {
    if (spec.type.kind !== 'struct') {
      throw new StructureShapeError(
        `${file.path}:${spec.pos.line}: type ${spec.name} is ${formatTypeExpr(spec.type)}, not a struct`,
        { file: file.path, structure: spec.name }
      )
    }

    if (spec.typeParams.length > 0) {
      const params = spec.typeParams.map((param) => param.name).join(', ')
      throw new StructureShapeError(
        `${file.path}:${spec.pos.line}: type ${spec.name}[${params}] is generic; generic structs are not supported`,
        { file: file.path, structure: spec.name }
      )
    }

    const fields = spec.type.fields.flatMap((decl) => this.resolveField(file, spec.name, decl))

    return Object.freeze({
      packageName: file.packageName,
      tableName: this.options.tableName,
      name: spec.name,
      fields: Object.freeze(fields),
    })
  }

  /**
   * One Field per declared name: `A, B int` gives two fields
   */
  private resolveField(file: SourceFile, structure: string, decl: FieldDecl): Field[] {
    if (decl.names.length === 0) {
      throw new StructureShapeError(
        `${file.path}:${decl.pos.line}: ${structure} embeds ${formatTypeExpr(decl.type)}; embedded fields are not supported`,
        { file: file.path, structure }
      )
    }

    const typeRef = resolveTypeRef(decl.type)
    if (typeRef.kind === 'unsupported') {
      throw new UnsupportedFieldTypeError(structure, decl.names[0], typeRef.shape)
    }
    const type = renderTypeRef(typeRef)

    return decl.names.map((name) =>
      Object.freeze({
        name,
        type,
        tags: decl.tag === undefined ? Object.freeze({}) : parseTagLiteral(decl.tag, { file: file.path, structure, field: name }),
      })
    )
  }
}

export function resolveTypeRef(type: TypeExpr): TypeRef {
  switch (type.kind) {
    case 'ident':
      return { kind: 'named', name: type.name }
    case 'selector':
      return { kind: 'qualified', pkg: type.pkg, name: type.name }
    default:
      return { kind: 'unsupported', shape: formatTypeExpr(type) }
  }
}

// Factory function for easy usage
export function resolveStructures(file: SourceFile, options: StructureResolverOptions = {}): Structure[] {
  return new StructureResolver(options).resolve(file)
}
