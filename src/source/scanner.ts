/**
 * Go Scanner
 *
 * Splits Go source text into tokens, inserting semicolons at line ends the
 * way the Go grammar does so the parser can treat `;` as the only separator.
 */

import { SourceSyntaxError } from '../core/errors.js'

export type TokenKind = 'ident' | 'keyword' | 'number' | 'rune' | 'string' | 'op' | ';' | 'eof'

export interface Token {
  kind: TokenKind
  value: string
  line: number
  column: number
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else',
  'fallthrough', 'for', 'func', 'go', 'goto', 'if', 'import', 'interface',
  'map', 'package', 'range', 'return', 'select', 'struct', 'switch', 'type', 'var',
])

// Longest first so that prefixes never win
const OPERATORS = [
  '<<=', '>>=', '&^=', '...',
  '&&', '||', '<-', '++', '--', '==', '!=', '<=', '>=', ':=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<', '>>', '&^',
  '+', '-', '*', '/', '%', '&', '|', '^', '<', '>', '=', '!', '~',
  '(', ')', '[', ']', '{', '}', ',', ';', '.', ':',
]

const SEMICOLON_KEYWORDS = new Set(['break', 'continue', 'fallthrough', 'return'])
const SEMICOLON_OPERATORS = new Set(['++', '--', ')', ']', '}'])

function isLetter(ch: string): boolean {
  return /^[\p{L}_]$/u.test(ch)
}

function isUnicodeDigit(ch: string): boolean {
  return /^\p{Nd}$/u.test(ch)
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9'
}

export class Scanner {
  private pos = 0
  private line = 1
  private column = 1
  private tokens: Token[] = []

  constructor(
    private readonly text: string,
    private readonly file: string
  ) {}

  /**
   * Scan the whole text. The result always ends with an `eof` token.
   */
  scan(): Token[] {
    this.tokens = []

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos]

      if (ch === '\n') {
        this.insertSemicolon()
        this.advance()
        continue
      }
      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance()
        continue
      }
      if (this.text.startsWith('//', this.pos)) {
        this.skipLineComment()
        continue
      }
      if (this.text.startsWith('/*', this.pos)) {
        this.skipBlockComment()
        continue
      }

      if (isLetter(this.peekCodePoint())) {
        this.scanIdentifier()
      } else if (isDigit(ch) || (ch === '.' && isDigit(this.peek(1)))) {
        this.scanNumber()
      } else if (ch === '"') {
        this.scanInterpretedString()
      } else if (ch === '`') {
        this.scanRawString()
      } else if (ch === "'") {
        this.scanRune()
      } else {
        this.scanOperator()
      }
    }

    this.insertSemicolon()
    this.tokens.push({ kind: 'eof', value: '', line: this.line, column: this.column })
    return this.tokens
  }

  private peek(offset = 0): string {
    return this.text[this.pos + offset] ?? ''
  }

  /** The full code point at the cursor, one or two UTF-16 units long */
  private peekCodePoint(): string {
    const code = this.text.codePointAt(this.pos)
    return code === undefined ? '' : String.fromCodePoint(code)
  }

  private advance(count = 1): void {
    for (let i = 0; i < count; i++) {
      if (this.text[this.pos] === '\n') {
        this.line++
        this.column = 1
      } else {
        this.column++
      }
      this.pos++
    }
  }

  private fail(message: string, line = this.line, column = this.column): never {
    throw new SourceSyntaxError(message, this.file, line, column)
  }

  private push(kind: TokenKind, start: number, line: number, column: number): void {
    this.tokens.push({ kind, value: this.text.slice(start, this.pos), line, column })
  }

  private insertSemicolon(): void {
    const last = this.tokens[this.tokens.length - 1]
    if (!last) return

    const needed =
      last.kind === 'ident' ||
      last.kind === 'number' ||
      last.kind === 'rune' ||
      last.kind === 'string' ||
      (last.kind === 'keyword' && SEMICOLON_KEYWORDS.has(last.value)) ||
      (last.kind === 'op' && SEMICOLON_OPERATORS.has(last.value))

    if (needed) {
      this.tokens.push({ kind: ';', value: '\n', line: this.line, column: this.column })
    }
  }

  private skipLineComment(): void {
    while (this.pos < this.text.length && this.peek() !== '\n') {
      this.advance()
    }
  }

  private skipBlockComment(): void {
    const line = this.line
    const column = this.column
    const end = this.text.indexOf('*/', this.pos + 2)
    if (end === -1) this.fail('comment not terminated', line, column)

    // A comment spanning lines acts like a newline
    const spansLines = this.text.slice(this.pos, end).includes('\n')
    if (spansLines) this.insertSemicolon()
    this.advance(end + 2 - this.pos)
  }

  private scanIdentifier(): void {
    const start = this.pos
    const line = this.line
    const column = this.column
    while (this.pos < this.text.length) {
      const ch = this.peekCodePoint()
      if (!isLetter(ch) && !isUnicodeDigit(ch)) break
      this.advance(ch.length)
    }
    const word = this.text.slice(start, this.pos)
    this.push(KEYWORDS.has(word) ? 'keyword' : 'ident', start, line, column)
  }

  private scanNumber(): void {
    const start = this.pos
    const line = this.line
    const column = this.column
    const hex = this.text.startsWith('0x', this.pos) || this.text.startsWith('0X', this.pos)

    while (this.pos < this.text.length) {
      const ch = this.peek()
      if (/[0-9a-zA-Z_.]/.test(ch)) {
        this.advance()
        continue
      }
      // Exponent sign: 1e+9, 0x1p-2
      const prev = this.text[this.pos - 1]
      const exponent = hex ? prev === 'p' || prev === 'P' : prev === 'e' || prev === 'E'
      if ((ch === '+' || ch === '-') && exponent) {
        this.advance()
        continue
      }
      break
    }
    this.push('number', start, line, column)
  }

  private scanInterpretedString(): void {
    const start = this.pos
    const line = this.line
    const column = this.column
    this.advance()

    for (;;) {
      const ch = this.peek()
      if (ch === '' || ch === '\n') this.fail('string literal not terminated', line, column)
      if (ch === '\\') {
        this.advance(2)
        continue
      }
      this.advance()
      if (ch === '"') break
    }
    this.push('string', start, line, column)
  }

  private scanRawString(): void {
    const start = this.pos
    const line = this.line
    const column = this.column
    const end = this.text.indexOf('`', this.pos + 1)
    if (end === -1) this.fail('raw string literal not terminated', line, column)
    this.advance(end + 1 - this.pos)
    this.push('string', start, line, column)
  }

  private scanRune(): void {
    const start = this.pos
    const line = this.line
    const column = this.column
    this.advance()

    for (;;) {
      const ch = this.peek()
      if (ch === '' || ch === '\n') this.fail('rune literal not terminated', line, column)
      if (ch === '\\') {
        this.advance(2)
        continue
      }
      this.advance()
      if (ch === "'") break
    }
    this.push('rune', start, line, column)
  }

  private scanOperator(): void {
    const op = OPERATORS.find((candidate) => this.text.startsWith(candidate, this.pos))
    if (!op) this.fail(`unexpected character ${JSON.stringify(this.peek())}`)

    const line = this.line
    const column = this.column
    const start = this.pos
    this.advance(op.length)
    this.push(op === ';' ? ';' : 'op', start, line, column)
  }
}

export function scan(text: string, file = '<input>'): Token[] {
  return new Scanner(text, file).scan()
}
