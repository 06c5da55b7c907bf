/**
 * Method Synthesizers
 *
 * One pure function per CRUD operation, each mapping a Structure to the
 * Method that implements it. Placeholders are `$1`, `$2`, ... in field
 * declaration order.
 */

import { EmptyUpdateSetError, MissingColumnError, MissingPrimaryKeyError } from './errors.js'
import { buildExecBody, buildQueryRowBody } from './statement-builder.js'
import { COLUMN_TAG, isPrimary, type Field, type Method, type Structure } from './structure-model.js'

const CONTEXT_PARAM = 'ctx context.Context'

export type Synthesizer = (structure: Structure) => Method

function elementType(structure: Structure): string {
  return `${structure.packageName}.${structure.name}`
}

function column(structure: Structure, field: Field): string {
  const name = field.tags[COLUMN_TAG]
  if (!name) throw new MissingColumnError(structure.name, field.name)
  return name
}

function primaryFields(structure: Structure, operation: string): Field[] {
  const fields = structure.fields.filter(isPrimary)
  if (fields.length === 0) throw new MissingPrimaryKeyError(structure.name, operation)
  return fields
}

/**
 * `id = $1 AND org = $2` over the primary fields, numbered from 1
 */
function primaryKeyClause(structure: Structure, fields: readonly Field[]): string {
  return fields.map((field, i) => `${column(structure, field)} = $${i + 1}`).join(' AND ')
}

/**
 * `<Type>Create` inserts every field
 */
export function synthesizeCreate(structure: Structure): Method {
  const name = `${structure.name}Create`

  const columns = structure.fields.map((field) => column(structure, field))
  const placeholders = structure.fields.map((_, i) => `$${i + 1}`)
  const values = structure.fields.map((field) => `data.${field.name}`)

  const sql = `INSERT INTO ${structure.tableName} (${columns.join(', ')}) VALUES (${placeholders.join(', ')})`

  return {
    name,
    comment: `// ${name} add new ${structure.name} to database`,
    iParams: `${CONTEXT_PARAM}, data *${elementType(structure)}`,
    oParams: 'err error',
    body: buildExecBody(name, sql, values),
  }
}

/**
 * `<Type>Select` fetches one row by primary key
 */
export function synthesizeSelect(structure: Structure): Method {
  const name = `${structure.name}Select`
  const keys = primaryFields(structure, name)

  const columns = structure.fields.map((field) => column(structure, field))
  const scanTargets = structure.fields.map((field) => `element.${field.name}`)

  const sql = `SELECT (${columns.join(', ')}) FROM ${structure.tableName} WHERE (${primaryKeyClause(structure, keys)})`

  return {
    name,
    comment: `// ${name} get ${structure.name} from database by pk`,
    iParams: [CONTEXT_PARAM, ...keys.map((field) => `${field.name} ${field.type}`)].join(', '),
    oParams: `element *${elementType(structure)}, err error`,
    body: buildQueryRowBody(
      name,
      sql,
      keys.map((field) => field.name),
      scanTargets
    ),
  }
}

/**
 * `<Type>Update` rewrites the non-key columns of the row matching the key.
 *
 * SET and WHERE draw their placeholders from one counter in field order,
 * because the argument list is every `data.<Field>` in that same order.
 */
export function synthesizeUpdate(structure: Structure): Method {
  const name = `${structure.name}Update`
  primaryFields(structure, name)

  const setTerms: string[] = []
  const whereTerms: string[] = []
  structure.fields.forEach((field, i) => {
    const term = `${column(structure, field)} = $${i + 1}`
    if (isPrimary(field)) whereTerms.push(term)
    else setTerms.push(term)
  })
  if (setTerms.length === 0) throw new EmptyUpdateSetError(structure.name)

  const values = structure.fields.map((field) => `data.${field.name}`)
  const sql = `UPDATE ${structure.tableName} SET (${setTerms.join(', ')}) WHERE (${whereTerms.join(' AND ')})`

  return {
    name,
    comment: `// ${name} update ${structure.name} in database by pk`,
    iParams: `${CONTEXT_PARAM}, data *${elementType(structure)}`,
    oParams: 'err error',
    body: buildExecBody(name, sql, values),
  }
}

/**
 * `<Type>Delete` removes the row matching the key
 */
export function synthesizeDelete(structure: Structure): Method {
  const name = `${structure.name}Delete`
  const keys = primaryFields(structure, name)

  const sql = `DELETE FROM ${structure.tableName} WHERE (${primaryKeyClause(structure, keys)})`

  return {
    name,
    comment: `// ${name} delete ${structure.name} from database by pk`,
    iParams: [CONTEXT_PARAM, ...keys.map((field) => `${field.name} ${field.type}`)].join(', '),
    oParams: 'err error',
    body: buildExecBody(
      name,
      sql,
      keys.map((field) => field.name)
    ),
  }
}

/** Rendering order of the generated methods */
export const SYNTHESIZERS: readonly Synthesizer[] = [
  synthesizeCreate,
  synthesizeSelect,
  synthesizeUpdate,
  synthesizeDelete,
]
