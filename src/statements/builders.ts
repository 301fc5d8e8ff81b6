import { ConfigurationError } from '../errors.js'
import type { Column } from '../columns/column.js'
import type { Schema } from '../schema/schema.js'
import { PlaceholderCounter, Statement } from './statement.js'

/** Anything carrying a model schema: a model handle. */
export interface SchemaSource {
  readonly name: string
  readonly schema: Schema
}

/** Anything bound to a model schema: a model instance. */
export interface InstanceSource {
  readonly model: SchemaSource
}

/** Equality filters keyed by attribute name or database column key. */
export type Filters = Readonly<Record<string, unknown>>

function requirePrimaryKey(source: SchemaSource, operation: string): Column<unknown> {
  const pk = source.schema.primaryKey()
  if (!pk) {
    throw new ConfigurationError(
      'MISSING_PRIMARY_KEY',
      `Cannot build ${operation} for "${source.name}": no primary key column declared`,
    )
  }
  return pk
}

function valuesOf(instance: InstanceSource): unknown[] {
  return instance.model.schema.columns().map((col) => col.get(instance))
}

/**
 * `SELECT <key>, ... FROM <table> [WHERE <key> = $1 AND ...]`
 *
 * The column list is left unparenthesised: PostgreSQL reads `(a, b)` as a
 * single row value, and rows must come back keyed by column.
 * Filters are ANDed exact matches, emitted in the order given. Filters whose
 * value is `undefined` are left out.
 *
 * @throws ConfigurationError when a filter names no declared column
 */
export function selectStatement(model: SchemaSource, filters: Filters = {}): Statement {
  const { schema } = model
  const counter = new PlaceholderCounter()
  const conditions: string[] = []
  const args: unknown[] = []

  for (const [name, value] of Object.entries(filters)) {
    if (value === undefined) continue
    const col = schema.resolve(name)
    if (!col) {
      throw new ConfigurationError('UNKNOWN_COLUMN', `Model "${model.name}" has no column "${name}"`)
    }
    conditions.push(`${col.key} = ${counter.next()}`)
    args.push(value)
  }

  let text = `SELECT ${schema.keys().join(', ')} FROM ${schema.tableName}`
  if (conditions.length > 0) {
    text += ` WHERE ${conditions.join(' AND ')}`
  }
  return new Statement('select', schema.tableName, text, args)
}

/** `INSERT INTO <table> (<keys>) VALUES ($1, ..., $n)` in declaration order. */
export function insertStatement(instance: InstanceSource): Statement {
  const { schema } = instance.model
  const counter = new PlaceholderCounter()
  const args = valuesOf(instance)
  const placeholders = args.map(() => counter.next())
  const text = `INSERT INTO ${schema.tableName} (${schema.keys().join(', ')}) VALUES (${placeholders.join(', ')})`
  return new Statement('insert', schema.tableName, text, args)
}

/**
 * `UPDATE <table> SET (<keys>) = ($1, ..., $n) WHERE <table>.<pk> = $(n+1)`
 *
 * A single-column schema renders the source as `ROW($1)`, which PostgreSQL
 * requires for a one-element column list.
 *
 * @throws ConfigurationError when the model has no primary key
 */
export function updateStatement(instance: InstanceSource): Statement {
  const { model } = instance
  const { schema } = model
  const pk = requirePrimaryKey(model, 'UPDATE')
  const counter = new PlaceholderCounter()
  const args = valuesOf(instance)
  const placeholders = args.map(() => counter.next()).join(', ')
  const source = args.length === 1 ? `ROW(${placeholders})` : `(${placeholders})`
  const table = schema.tableName
  const text =
    `UPDATE ${table} SET (${schema.keys().join(', ')}) = ${source}` +
    ` WHERE ${table}.${pk.key} = ${counter.next()}`
  return new Statement('update', table, text, [...args, pk.get(instance)])
}

/**
 * `DELETE FROM <table> WHERE <table>.<pk> = $1`
 *
 * @throws ConfigurationError when the model has no primary key
 */
export function deleteStatement(instance: InstanceSource): Statement {
  const { model } = instance
  const pk = requirePrimaryKey(model, 'DELETE')
  const table = model.schema.tableName
  const counter = new PlaceholderCounter()
  return new Statement('delete', table, `DELETE FROM ${table} WHERE ${table}.${pk.key} = ${counter.next()}`, [
    pk.get(instance),
  ])
}
