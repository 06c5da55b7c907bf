/**
 * Tag Parser Tests
 */

import { describe, it, expect } from 'vitest'
import { parseTag, parseTagLiteral } from '../../src/core/tag-parser.js'
import { TagParseError } from '../../src/core/errors.js'

describe('parseTag', () => {
  it('reads key:"value" pairs', () => {
    expect(parseTag('column:"id" primary:"true"')).toEqual({ column: 'id', primary: 'true' })
  })

  it('returns an empty map for an empty tag', () => {
    expect(parseTag('')).toEqual({})
    expect(parseTag('   ')).toEqual({})
  })

  it('keeps spaces inside values without shifting later pairs', () => {
    expect(parseTag('column:"full name" primary:"true"')).toEqual({ column: 'full name', primary: 'true' })
  })

  it('decodes escapes inside values', () => {
    expect(parseTag('column:"a\\"b" note:"tab\\there"')).toEqual({ column: 'a"b', note: 'tab\there' })
  })

  it('decodes unicode escapes inside values', () => {
    expect(parseTag('column:"caf\\u00e9" note:"\\U0001F600"')).toEqual({ column: 'caf\u00e9', note: '\u{1F600}' })
  })

  it('tolerates extra whitespace between pairs', () => {
    expect(parseTag('  column:"id"\t  primary:"true" ')).toEqual({ column: 'id', primary: 'true' })
  })

  it('lets the last duplicate key win', () => {
    expect(parseTag('column:"a" column:"b"')).toEqual({ column: 'b' })
  })

  it('returns a frozen map', () => {
    expect(Object.isFrozen(parseTag('column:"id"'))).toBe(true)
  })

  describe('malformed tags', () => {
    it('rejects a key without a colon', () => {
      expect(() => parseTag('column')).toThrow(TagParseError)
      expect(() => parseTag('column')).toThrow('malformed struct tag at offset 6: expected \':\' after key "column"')
    })

    it('rejects an unquoted value', () => {
      expect(() => parseTag('column:id')).toThrow('malformed struct tag at offset 7: expected \'"\' to open the value of "column"')
    })

    it('rejects an unterminated value', () => {
      expect(() => parseTag('column:"id')).toThrow('malformed struct tag at offset 7: value of "column" is not terminated')
    })

    it('rejects an empty key', () => {
      expect(() => parseTag(':"x"')).toThrow('malformed struct tag at offset 0: empty key')
    })

    it.each([
      ['above the Unicode range', '\\U00110000'],
      ['a surrogate half', '\\uD800'],
    ])('rejects a value escaping %s', (_, escape) => {
      const tag = `column:"${escape}" primary:"true"`

      expect(() => parseTag(tag, { structure: 'User', field: 'ID' })).toThrow(TagParseError)
      expect(() => parseTag(tag, { structure: 'User', field: 'ID' })).toThrow(
        'User.ID: malformed struct tag at offset 7: value of "column" is not a valid string'
      )
    })

    it('names the field in the message', () => {
      expect(() => parseTag('column', { structure: 'User', field: 'ID' })).toThrow(
        'User.ID: malformed struct tag at offset 6: expected \':\' after key "column"'
      )
    })

    it('carries the offset and field on the error', () => {
      try {
        parseTag('column:"id" primary', { structure: 'User', field: 'ID' })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(TagParseError)
        if (!(error instanceof TagParseError)) return
        expect(error.offset).toBe(19)
        expect(error.code).toBe('TAG_PARSE')
        expect(error.context).toEqual({ structure: 'User', field: 'ID', offset: 19 })
      }
    })
  })
})

describe('parseTagLiteral', () => {
  it('reads a raw string tag', () => {
    expect(parseTagLiteral('`column:"id" primary:"true"`')).toEqual({ column: 'id', primary: 'true' })
  })

  it('reads an interpreted string tag', () => {
    expect(parseTagLiteral('"column:\\"id\\""')).toEqual({ column: 'id' })
  })

  it('rejects a literal that is not a string', () => {
    expect(() => parseTagLiteral('column')).toThrow('malformed struct tag at offset 0: tag is not a valid string literal')
  })
})
