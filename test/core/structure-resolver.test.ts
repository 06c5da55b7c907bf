/**
 * StructureResolver Tests
 *
 * Tests for normalizing parsed type declarations into Structures.
 */

import { describe, it, expect } from 'vitest'
import { parseSourceFile } from '../../src/source/parser.js'
import { StructureResolver, resolveStructures, resolveTypeRef } from '../../src/core/structure-resolver.js'
import { StructureShapeError, TagParseError, UnsupportedFieldTypeError } from '../../src/core/errors.js'

function resolve(text: string, tableName?: string) {
  return resolveStructures(parseSourceFile(text, 'model/user.go'), { tableName })
}

describe('StructureResolver', () => {
  it('normalizes a tagged struct', () => {
    const [user] = resolve(`package model

type User struct {
	ID   int64  \`column:"id" primary:"true"\`
	Name string \`column:"name"\`
}
`)

    expect(user).toEqual({
      packageName: 'model',
      tableName: 'testTable',
      name: 'User',
      fields: [
        { name: 'ID', type: 'int64', tags: { column: 'id', primary: 'true' } },
        { name: 'Name', type: 'string', tags: { column: 'name' } },
      ],
    })
  })

  it('takes the table name from options', () => {
    const [user] = resolve('package model\ntype User struct{ ID int64 }\n', 'users')

    expect(user.tableName).toBe('users')
  })

  it('renders package-qualified field types', () => {
    const [event] = resolve(`package model
type Event struct {
	At time.Time \`column:"at"\`
}`)

    expect(event.fields[0].type).toBe('time.Time')
  })

  it('gives untagged fields an empty tag map', () => {
    const [note] = resolve('package model\ntype Note struct{ Body string }\n')

    expect(note.fields[0].tags).toEqual({})
  })

  it('expands multi-name fields into one field per name', () => {
    const [person] = resolve(`package model
type Person struct {
	First, Last string \`column:"name"\`
}`)

    expect(person.fields.map((field) => [field.name, field.type, field.tags.column])).toEqual([
      ['First', 'string', 'name'],
      ['Last', 'string', 'name'],
    ])
  })

  it('reads only the first spec of a grouped type declaration', () => {
    const structures = resolve(`package model
type (
	A struct{ X int }
	B struct{ Y int }
)
type C struct{ Z int }
`)

    expect(structures.map((structure) => structure.name)).toEqual(['A', 'C'])
  })

  it('skips imports, consts, vars and funcs', () => {
    const structures = resolve(`package model
import "fmt"
const N = 1
var v = fmt.Sprint(N)
func f() {}
type A struct{ X int }
`)

    expect(structures.map((structure) => structure.name)).toEqual(['A'])
  })

  it('returns frozen structures', () => {
    const [user] = resolve('package model\ntype User struct{ ID int64 }\n')

    expect(Object.isFrozen(user)).toBe(true)
    expect(Object.isFrozen(user.fields)).toBe(true)
    expect(Object.isFrozen(user.fields[0])).toBe(true)
  })

  it('reports an out-of-range escape in a tag as a tag error', () => {
    const text = 'package model\ntype User struct {\n\tID int64 `column:"\\U00110000" primary:"true"`\n}\n'

    expect(() => resolve(text)).toThrow(TagParseError)
    expect(() => resolve(text)).toThrow('User.ID: malformed struct tag at offset 7: value of "column" is not a valid string')
  })

  describe('shape errors', () => {
    it('rejects an empty type group', () => {
      expect(() => resolve('package model\ntype ()\n')).toThrow(StructureShapeError)
      expect(() => resolve('package model\ntype ()\n')).toThrow('model/user.go:2: empty type declaration group')
    })

    it('rejects a type that is not a struct', () => {
      expect(() => resolve('package model\n\ntype ID int64\n')).toThrow(
        'model/user.go:3: type ID is int64, not a struct'
      )
    })

    it('rejects generic structs', () => {
      const text = 'package model\ntype Page[T any, K comparable] struct {\n\tID int64 `column:"id" primary:"true"`\n\tItems T `column:"items"`\n}\n'

      expect(() => resolve(text)).toThrow(StructureShapeError)
      expect(() => resolve(text)).toThrow(
        'model/user.go:2: type Page[T, K] is generic; generic structs are not supported'
      )
    })

    it('rejects embedded fields', () => {
      expect(() => resolve('package model\ntype User struct {\n\tBase\n}\n')).toThrow(
        'model/user.go:3: User embeds Base; embedded fields are not supported'
      )
    })

    it.each([
      ['*Person', 'Manager *Person'],
      ['[]string', 'Roles []string'],
      ['map[string]int', 'Scores map[string]int'],
      ['List[int]', 'Items List[int]'],
      ['struct{...}', 'Meta struct{ X int }'],
    ])('rejects a %s field', (shape, declaration) => {
      const text = `package model\ntype User struct {\n\t${declaration}\n}\n`
      const name = declaration.split(' ')[0]

      expect(() => resolve(text)).toThrow(UnsupportedFieldTypeError)
      expect(() => resolve(text)).toThrow(
        `User.${name}: unsupported field type shape "${shape}" (expected a named or package-qualified type)`
      )
    })

    it('names the field when its tag is malformed', () => {
      const text = 'package model\ntype User struct {\n\tID int64 `column:id`\n}\n'

      expect(() => resolve(text)).toThrow(TagParseError)
      expect(() => resolve(text)).toThrow('User.ID: malformed struct tag at offset 7')
    })
  })
})

describe('resolveTypeRef', () => {
  it('classifies type shapes', () => {
    expect(resolveTypeRef({ kind: 'ident', name: 'int64' })).toEqual({ kind: 'named', name: 'int64' })
    expect(resolveTypeRef({ kind: 'selector', pkg: 'uuid', name: 'UUID' })).toEqual({
      kind: 'qualified',
      pkg: 'uuid',
      name: 'UUID',
    })
    expect(resolveTypeRef({ kind: 'pointer', elem: { kind: 'ident', name: 'int' } })).toEqual({
      kind: 'unsupported',
      shape: '*int',
    })
  })
})

describe('StructureResolver defaults', () => {
  it('uses testTable when no table is configured', () => {
    const resolver = new StructureResolver()
    const [user] = resolver.resolve(parseSourceFile('package model\ntype User struct{ ID int64 }\n'))

    expect(user.tableName).toBe('testTable')
  })
})
