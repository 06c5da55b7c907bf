/**
 * Go Declaration Parser
 *
 * Reads the package clause and top-level declarations of a Go file into a
 * declaration tree. Type declarations are parsed fully; function bodies and
 * const/var initialisers are skipped by bracket balance.
 */

import { SourceSyntaxError } from '../core/errors.js'
import { unquote } from './literals.js'
import { scan, type Token } from './scanner.js'
import type {
  Decl,
  FieldDecl,
  FuncDecl,
  GenDecl,
  ImportSpec,
  Position,
  SourceFile,
  Spec,
  TypeExpr,
  TypeParam,
  TypeSpec,
  ValueSpec,
} from './ast.js'

const OPENERS = new Set(['(', '[', '{'])
const CLOSERS = new Set([')', ']', '}'])

export class GoParser {
  private tokens: Token[]
  private index = 0

  constructor(
    text: string,
    private readonly path: string
  ) {
    this.tokens = scan(text, path)
  }

  /**
   * Parse the whole file
   */
  parse(): SourceFile {
    this.skipSemicolons()
    this.expectKeyword('package')
    const packageName = this.expectIdent()
    this.expectSemicolon()

    const decls: Decl[] = []
    const imports: ImportSpec[] = []

    for (;;) {
      this.skipSemicolons()
      const token = this.current()
      if (token.kind === 'eof') break

      if (token.kind !== 'keyword') {
        this.fail(`expected declaration, found ${describe(token)}`)
      }

      switch (token.value) {
        case 'import': {
          const decl = this.parseGenDecl('import', () => this.parseImportSpec())
          for (const spec of decl.specs) {
            if (spec.kind === 'import') imports.push(spec)
          }
          decls.push(decl)
          break
        }
        case 'const':
          decls.push(this.parseGenDecl('const', () => this.parseValueSpec()))
          break
        case 'var':
          decls.push(this.parseGenDecl('var', () => this.parseValueSpec()))
          break
        case 'type':
          decls.push(this.parseGenDecl('type', () => this.parseTypeSpec()))
          break
        case 'func':
          decls.push(this.parseFuncDecl())
          break
        default:
          this.fail(`expected declaration, found ${describe(token)}`)
      }
    }

    return { path: this.path, packageName, imports, decls }
  }

  // ===========================================================================
  // Declarations
  // ===========================================================================

  private parseGenDecl(tok: GenDecl['tok'], parseSpec: () => Spec): GenDecl {
    const pos = this.position()
    this.advance()

    const specs: Spec[] = []

    if (!this.isOp('(')) {
      specs.push(parseSpec())
      this.expectSemicolon()
      return { kind: 'gen', tok, grouped: false, specs, pos }
    }

    this.advance()
    for (;;) {
      this.skipSemicolons()
      if (this.isOp(')')) break
      specs.push(parseSpec())
      if (!this.isOp(')')) this.expectSemicolon()
    }
    this.advance()
    this.expectSemicolon()

    return { kind: 'gen', tok, grouped: true, specs, pos }
  }

  private parseImportSpec(): ImportSpec {
    const pos = this.position()
    let alias: string | undefined

    const token = this.current()
    if (token.kind === 'ident' || (token.kind === 'op' && token.value === '.')) {
      alias = token.value
      this.advance()
    }

    const literal = this.current()
    if (literal.kind !== 'string') {
      this.fail(`expected import path, found ${describe(literal)}`)
    }
    const path = unquote(literal.value)
    if (path === undefined) this.fail('malformed import path')
    this.advance()

    return { kind: 'import', alias, path, pos }
  }

  private parseValueSpec(): ValueSpec {
    const pos = this.position()
    const names = [this.expectIdent()]
    while (this.isOp(',')) {
      this.advance()
      names.push(this.expectIdent())
    }
    // Type and initialiser are not needed
    this.skipUntilSpecEnd()
    return { kind: 'value', names, pos }
  }

  private parseTypeSpec(): TypeSpec {
    const pos = this.position()
    const name = this.expectIdent()

    const typeParams = this.startsTypeParams() ? this.parseTypeParams() : []

    let alias = false
    if (this.isOp('=')) {
      alias = true
      this.advance()
    }

    return { kind: 'type', name, alias, typeParams, type: this.parseType(), pos }
  }

  private parseFuncDecl(): FuncDecl {
    const pos = this.position()
    this.advance()

    let receiver: string | undefined
    if (this.isOp('(')) {
      const inner = this.skipBalanced().slice(1, -1)
      // Drop the receiver's name, keep its type
      const typeTokens = inner.length > 1 && inner[0].kind === 'ident' && inner[1].value !== '.' ? inner.slice(1) : inner
      receiver = typeTokens.map((t) => t.value).join('')
    }

    const name = this.expectIdent()

    if (this.isOp('[')) this.skipBalanced()
    if (!this.isOp('(')) this.fail(`expected parameter list, found ${describe(this.current())}`)
    this.skipBalanced()

    // Result types, then an optional body
    for (;;) {
      const token = this.current()
      if (token.kind === ';' || token.kind === 'eof') break
      if (token.kind === 'keyword' && (token.value === 'struct' || token.value === 'interface')) {
        this.advance()
        this.skipBalanced()
        continue
      }
      if (token.kind === 'op' && token.value === '{') {
        this.skipBalanced()
        break
      }
      if (token.kind === 'op' && OPENERS.has(token.value)) {
        this.skipBalanced()
        continue
      }
      this.advance()
    }
    this.expectSemicolon()

    return { kind: 'func', name, receiver, pos }
  }

  // ===========================================================================
  // Types
  // ===========================================================================

  /**
   * `[T any]` opens a type parameter list, `[N]T` an array type
   */
  private startsTypeParams(): boolean {
    if (!this.isOp('[')) return false
    const first = this.peek(1)
    const second = this.peek(2)
    if (first.kind !== 'ident') return false
    if (second.kind === 'ident' || second.kind === 'keyword') return true
    return second.kind === 'op' && (second.value === ',' || second.value === '~' || second.value === '[')
  }

  private parseTypeParams(): TypeParam[] {
    this.expectOp('[')
    const params: TypeParam[] = []

    while (!this.isOp(']')) {
      const names = [this.expectIdent()]
      while (this.isOp(',')) {
        this.advance()
        names.push(this.expectIdent())
      }
      const constraint = this.parseConstraint()
      for (const name of names) params.push({ name, constraint })
      if (this.isOp(',')) this.advance()
    }
    this.advance()

    return params
  }

  /** `~int | ~string` keeps the first term */
  private parseConstraint(): TypeExpr {
    if (this.isOp('~')) this.advance()
    const first = this.parseType()
    while (this.isOp('|')) {
      this.advance()
      if (this.isOp('~')) this.advance()
      this.parseType()
    }
    return first
  }

  parseType(): TypeExpr {
    const token = this.current()

    if (token.kind === 'ident') {
      this.advance()
      let type: TypeExpr = { kind: 'ident', name: token.value }
      if (this.isOp('.')) {
        this.advance()
        type = { kind: 'selector', pkg: token.value, name: this.expectIdent() }
      }
      if (this.isOp('[')) {
        this.advance()
        const args: TypeExpr[] = [this.parseType()]
        while (this.isOp(',')) {
          this.advance()
          if (this.isOp(']')) break
          args.push(this.parseType())
        }
        this.expectOp(']')
        type = { kind: 'generic', base: type, args }
      }
      return type
    }

    if (token.kind === 'op') {
      switch (token.value) {
        case '*':
          this.advance()
          return { kind: 'pointer', elem: this.parseType() }
        case '[':
          return this.parseArrayType()
        case '<-':
          this.advance()
          this.expectKeyword('chan')
          return { kind: 'chan', dir: 'recv', elem: this.parseType() }
        case '(': {
          this.advance()
          const inner = this.parseType()
          this.expectOp(')')
          return inner
        }
      }
    }

    if (token.kind === 'keyword') {
      switch (token.value) {
        case 'map': {
          this.advance()
          this.expectOp('[')
          const key = this.parseType()
          this.expectOp(']')
          return { kind: 'map', key, value: this.parseType() }
        }
        case 'chan': {
          this.advance()
          let dir: 'both' | 'send' = 'both'
          if (this.isOp('<-')) {
            this.advance()
            dir = 'send'
          }
          return { kind: 'chan', dir, elem: this.parseType() }
        }
        case 'func':
          this.advance()
          this.skipSignature()
          return { kind: 'func' }
        case 'struct':
          this.advance()
          return { kind: 'struct', fields: this.parseStructBody() }
        case 'interface':
          this.advance()
          this.skipBalanced()
          return { kind: 'interface' }
      }
    }

    this.fail(`expected type, found ${describe(token)}`)
  }

  private parseArrayType(): TypeExpr {
    this.expectOp('[')
    if (this.isOp(']')) {
      this.advance()
      return { kind: 'array', elem: this.parseType() }
    }

    const lengthTokens: string[] = []
    let depth = 0
    while (depth > 0 || !this.isOp(']')) {
      const token = this.current()
      if (token.kind === 'eof') this.fail('array length not terminated')
      if (token.kind === 'op' && OPENERS.has(token.value)) depth++
      if (token.kind === 'op' && CLOSERS.has(token.value)) depth--
      lengthTokens.push(token.value)
      this.advance()
    }
    this.advance()

    return { kind: 'array', length: lengthTokens.join(''), elem: this.parseType() }
  }

  private parseStructBody(): FieldDecl[] {
    this.expectOp('{')
    const fields: FieldDecl[] = []

    for (;;) {
      this.skipSemicolons()
      if (this.isOp('}')) break
      fields.push(this.parseFieldDecl())
      if (!this.isOp('}')) this.expectSemicolon()
    }
    this.advance()

    return fields
  }

  private parseFieldDecl(): FieldDecl {
    const pos = this.position()
    const token = this.current()
    let names: string[] = []
    let type: TypeExpr

    if (token.kind === 'ident') {
      const next = this.peek(1)
      const embedded =
        next.kind === ';' ||
        next.kind === 'string' ||
        (next.kind === 'op' && (next.value === '.' || next.value === '}'))

      if (embedded) {
        type = this.parseType()
      } else {
        names = [this.expectIdent()]
        while (this.isOp(',')) {
          this.advance()
          names.push(this.expectIdent())
        }
        type = this.parseType()
      }
    } else if (token.kind === 'op' && token.value === '*') {
      type = this.parseType()
    } else {
      this.fail(`expected field declaration, found ${describe(token)}`)
    }

    let tag: string | undefined
    const tagToken = this.current()
    if (tagToken.kind === 'string') {
      tag = tagToken.value
      this.advance()
    }

    return { names, type, tag, pos }
  }

  private skipSignature(): void {
    if (this.isOp('(')) this.skipBalanced()

    const token = this.current()
    if (token.kind === 'op' && token.value === '(') {
      this.skipBalanced()
    } else if (this.startsType(token)) {
      this.parseType()
    }
  }

  private startsType(token: Token): boolean {
    if (token.kind === 'ident') return true
    if (token.kind === 'keyword') {
      return ['map', 'chan', 'func', 'struct', 'interface'].includes(token.value)
    }
    return token.kind === 'op' && ['*', '[', '<-'].includes(token.value)
  }

  // ===========================================================================
  // Token helpers
  // ===========================================================================

  private current(): Token {
    return this.peek(0)
  }

  private peek(offset: number): Token {
    const last = this.tokens[this.tokens.length - 1]
    return this.tokens[this.index + offset] ?? last
  }

  private advance(): void {
    if (this.index < this.tokens.length - 1) this.index++
  }

  private position(): Position {
    const token = this.current()
    return { line: token.line, column: token.column }
  }

  private isOp(value: string): boolean {
    const token = this.current()
    return token.kind === 'op' && token.value === value
  }

  private expectOp(value: string): void {
    if (!this.isOp(value)) this.fail(`expected '${value}', found ${describe(this.current())}`)
    this.advance()
  }

  private expectKeyword(value: string): void {
    const token = this.current()
    if (token.kind !== 'keyword' || token.value !== value) {
      this.fail(`expected '${value}', found ${describe(token)}`)
    }
    this.advance()
  }

  private expectIdent(): string {
    const token = this.current()
    if (token.kind !== 'ident') this.fail(`expected identifier, found ${describe(token)}`)
    this.advance()
    return token.value
  }

  /**
   * A declaration ends at `;`, at end of file, or right before a closing bracket
   */
  private expectSemicolon(): void {
    const token = this.current()
    if (token.kind === ';') {
      this.advance()
      return
    }
    if (token.kind === 'eof' || (token.kind === 'op' && CLOSERS.has(token.value))) return
    this.fail(`expected ';' or newline, found ${describe(token)}`)
  }

  private skipSemicolons(): void {
    while (this.current().kind === ';') this.advance()
  }

  /**
   * Skip from an opening bracket to its partner, returning the skipped tokens
   */
  private skipBalanced(): Token[] {
    const start = this.current()
    if (start.kind !== 'op' || !OPENERS.has(start.value)) {
      this.fail(`expected opening bracket, found ${describe(start)}`)
    }

    const skipped: Token[] = []
    let depth = 0
    do {
      const token = this.current()
      if (token.kind === 'eof') this.fail(`'${start.value}' not closed`, start)
      if (token.kind === 'op' && OPENERS.has(token.value)) depth++
      if (token.kind === 'op' && CLOSERS.has(token.value)) depth--
      skipped.push(token)
      this.advance()
    } while (depth > 0)

    return skipped
  }

  private skipUntilSpecEnd(): void {
    let depth = 0
    for (;;) {
      const token = this.current()
      if (token.kind === 'eof') return
      if (depth === 0 && (token.kind === ';' || (token.kind === 'op' && token.value === ')'))) return
      if (token.kind === 'op' && OPENERS.has(token.value)) depth++
      if (token.kind === 'op' && CLOSERS.has(token.value)) depth--
      this.advance()
    }
  }

  private fail(message: string, at: Token = this.current()): never {
    throw new SourceSyntaxError(message, this.path, at.line, at.column)
  }
}

function describe(token: Token): string {
  if (token.kind === 'eof') return 'end of file'
  if (token.kind === ';') return token.value === '\n' ? 'newline' : "';'"
  return `'${token.value}'`
}

// Factory function for easy usage
export function parseSourceFile(text: string, path = '<input>'): SourceFile {
  return new GoParser(text, path).parse()
}
