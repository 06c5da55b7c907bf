/**
 * Statement Builder Tests
 */

import { describe, it, expect } from 'vitest'
import { buildExecBody, buildQueryRowBody, goString } from '../../src/core/statement-builder.js'

describe('goString', () => {
  it('quotes plain text', () => {
    expect(goString('DELETE FROM t WHERE (id = $1)')).toBe('"DELETE FROM t WHERE (id = $1)"')
  })

  it('escapes quotes, backslashes and newlines', () => {
    expect(goString('a"b\\c\nd')).toBe('"a\\"b\\\\c\\nd"')
  })
})

describe('buildExecBody', () => {
  it('passes the statement and values to Exec', () => {
    const body = buildExecBody('TagDelete', 'DELETE FROM tags WHERE (id = $1)', ['ID'])

    expect(body.split('\n')).toEqual([
      '\tctg, err := p.db.Exec(ctx, "DELETE FROM tags WHERE (id = $1)", ID)',
      '\tif err != nil {',
      '\t\treturn fmt.Errorf("TagDelete error: %w ", err)',
      '\t}',
      '\tif ctg.RowsAffected() == 0 {',
      '\t\treturn fmt.Errorf("TagDelete error: no rows affected")',
      '\t}',
      '',
      '\treturn nil',
    ])
  })
})

describe('buildQueryRowBody', () => {
  it('scans the row into the targets', () => {
    const body = buildQueryRowBody('TagSelect', 'SELECT (id) FROM tags WHERE (id = $1)', ['ID'], ['element.ID'])

    expect(body.split('\n')).toEqual([
      '\terr = p.db.QueryRow(ctx, "SELECT (id) FROM tags WHERE (id = $1)", ID).Scan(element.ID)',
      '\tif err != nil {',
      '\t\treturn nil, fmt.Errorf("TagSelect error: %w ", err)',
      '\t}',
      '',
      '\treturn element, nil',
    ])
  })
})
