/**
 * Struct Tag Parser
 *
 * Reads a Go struct tag, a sequence of `key:"value"` pairs separated by
 * spaces, into a tag map. Values are quoted Go strings and may contain spaces.
 */

import { TagParseError, type ErrorContext } from './errors.js'
import { unquote } from '../source/literals.js'
import type { TagMap } from './structure-model.js'

/**
 * Parse the raw tag literal as written in source (with its backticks or
 * double quotes)
 */
export function parseTagLiteral(literal: string, context: ErrorContext = {}): TagMap {
  const tag = unquote(literal)
  if (tag === undefined) {
    throw new TagParseError('tag is not a valid string literal', 0, context)
  }
  return parseTag(tag, context)
}

/**
 * Parse the tag's text
 *
 * @example
 * parseTag('column:"id" primary:"true"')
 * // => { column: 'id', primary: 'true' }
 */
export function parseTag(tag: string, context: ErrorContext = {}): TagMap {
  const tags: Record<string, string> = {}
  let i = 0

  const fail = (message: string, offset: number): never => {
    throw new TagParseError(message, offset, context)
  }

  for (;;) {
    while (i < tag.length && /\s/.test(tag[i])) i++
    if (i >= tag.length) break

    // Key: any run of characters up to the colon, no spaces or quotes
    const keyStart = i
    while (i < tag.length && tag[i] !== ':' && tag[i] !== '"' && !/\s/.test(tag[i])) i++
    const key = tag.slice(keyStart, i)

    if (key === '') fail('empty key', keyStart)
    if (tag[i] !== ':') fail(`expected ':' after key "${key}"`, i)
    i++
    if (tag[i] !== '"') fail(`expected '"' to open the value of "${key}"`, i)

    // Value: a Go interpreted string
    const valueStart = i
    i++
    while (i < tag.length && tag[i] !== '"') {
      if (tag[i] === '\\') i++
      i++
    }
    if (i >= tag.length) fail(`value of "${key}" is not terminated`, valueStart)
    i++

    const value = unquote(tag.slice(valueStart, i))
    if (value === undefined) fail(`value of "${key}" is not a valid string`, valueStart)
    else tags[key] = value
  }

  return Object.freeze(tags)
}
