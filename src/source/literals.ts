/**
 * Go string literal decoding
 */

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  "'": "'",
  '"': '"',
}

/**
 * Decode a raw (`` `...` ``) or interpreted (`"..."`) string literal.
 * Returns undefined when the literal is malformed.
 */
export function unquote(literal: string): string | undefined {
  if (literal.length < 2) return undefined

  const quote = literal[0]
  if (literal[literal.length - 1] !== quote) return undefined

  const inner = literal.slice(1, -1)

  if (quote === '`') {
    return inner.includes('`') ? undefined : inner.replace(/\r/g, '')
  }
  if (quote !== '"') return undefined

  let out = ''
  for (let i = 0; i < inner.length; i++) {
    const ch = inner[i]
    if (ch === '"' || ch === '\n') return undefined
    if (ch !== '\\') {
      out += ch
      continue
    }

    const next = inner[i + 1]
    if (next === undefined) return undefined

    if (next in SIMPLE_ESCAPES) {
      out += SIMPLE_ESCAPES[next]
      i++
      continue
    }

    const hexWidth = next === 'x' ? 2 : next === 'u' ? 4 : next === 'U' ? 8 : 0
    if (hexWidth > 0) {
      const digits = inner.slice(i + 2, i + 2 + hexWidth)
      if (!new RegExp(`^[0-9a-fA-F]{${hexWidth}}$`).test(digits)) return undefined
      const code = parseInt(digits, 16)
      // \u and \U must name a valid Unicode code point, surrogates excluded
      if (hexWidth > 2 && (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff))) return undefined
      out += String.fromCodePoint(code)
      i += 1 + hexWidth
      continue
    }

    const octal = inner.slice(i + 1, i + 4)
    if (/^[0-7]{3}$/.test(octal)) {
      out += String.fromCharCode(parseInt(octal, 8))
      i += 3
      continue
    }

    return undefined
  }

  return out
}
