/**
 * Scanner Tests
 */

import { describe, it, expect } from 'vitest'
import { scan } from '../../src/source/scanner.js'
import { SourceSyntaxError } from '../../src/core/errors.js'

function kindsAndValues(text: string): string[] {
  return scan(text).map((token) => `${token.kind}:${token.value}`)
}

describe('Scanner', () => {
  it('inserts semicolons at line ends after identifiers and literals', () => {
    expect(kindsAndValues('package main\nvar x = 1\n')).toEqual([
      'keyword:package',
      'ident:main',
      ';:\n',
      'keyword:var',
      'ident:x',
      'op:=',
      'number:1',
      ';:\n',
      'eof:',
    ])
  })

  it('does not insert a semicolon after an opening bracket', () => {
    expect(kindsAndValues('type (\n)')).toEqual(['keyword:type', 'op:(', 'op:)', ';:\n', 'eof:'])
  })

  it('keeps raw string literals whole', () => {
    const tokens = scan('`column:"id" primary:"true"`')

    expect(tokens[0]).toEqual({ kind: 'string', value: '`column:"id" primary:"true"`', line: 1, column: 1 })
  })

  it('tracks lines across multi-line raw strings', () => {
    const tokens = scan('`a\nb` x')

    expect(tokens[1]).toMatchObject({ kind: 'ident', value: 'x', line: 2, column: 4 })
  })

  it('treats a multi-line block comment as a newline', () => {
    expect(kindsAndValues('x /* a\nb */ y')).toEqual(['ident:x', ';:\n', 'ident:y', ';:\n', 'eof:'])
  })

  it('skips line comments', () => {
    expect(kindsAndValues('x // trailing } comment\n')).toEqual(['ident:x', ';:\n', 'eof:'])
  })

  it('prefers the longest operator', () => {
    expect(kindsAndValues('chan<- a <-chan b')).toEqual([
      'keyword:chan',
      'op:<-',
      'ident:a',
      'op:<-',
      'keyword:chan',
      'ident:b',
      ';:\n',
      'eof:',
    ])
  })

  it('scans numbers with exponents and escapes in strings', () => {
    expect(kindsAndValues('1.5e-3 "a\\"b" \'\\n\'')).toEqual([
      'number:1.5e-3',
      'string:"a\\"b"',
      "rune:'\\n'",
      ';:\n',
      'eof:',
    ])
  })

  it('reads identifiers with letters outside the basic plane', () => {
    expect(kindsAndValues('x\u{1D4B3}1 \u{1D4B3}y')).toEqual(['ident:x\u{1D4B3}1', 'ident:\u{1D4B3}y', ';:\n', 'eof:'])
  })

  it('reports unterminated strings with their position', () => {
    expect(() => scan('x\n  "abc\n')).toThrow(SourceSyntaxError)
    expect(() => scan('x\n  "abc\n')).toThrow('<input>:2:3: string literal not terminated')
  })

  it('reports unterminated block comments', () => {
    expect(() => scan('/* open', 'model/user.go')).toThrow('model/user.go:1:1: comment not terminated')
  })
})
