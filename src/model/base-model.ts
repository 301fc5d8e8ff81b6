import { MappingError } from '../errors.js'
import type { Column } from '../columns/column.js'
import { buildSchema, type ColumnMap, type Schema } from '../schema/schema.js'
import type { Row } from '../connection/interface.js'

/** Value type a column stores on an instance. */
export type ColumnValue<Col> = Col extends Column<infer T> ? T | null : never

/** Construction input: any subset of the declared attributes. */
export type ModelInit<C extends ColumnMap> = { [A in keyof C]?: ColumnValue<C[A]> }

/**
 * Values for `create`: declared attributes, typed, or database keys.
 * Names matching no column are kept as extras.
 */
export type ModelValues<C extends ColumnMap> = ModelInit<C> & Readonly<Row>

export interface BaseModelOptions<C extends ColumnMap> {
  name: string
  /** Overrides the default table name (the lowercased model name). */
  tableName?: string
  columns: C
}

function isPositional(row: Row | unknown[]): row is unknown[] {
  return Array.isArray(row)
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (value instanceof Date) return value.toISOString()
  return String(value)
}

/**
 * A model definition: its declared columns, the schema built from them
 * and construction of instances.
 */
export class BaseModel<C extends ColumnMap> {
  readonly name: string
  /** Metadata accessor: the declared columns by attribute name. */
  readonly columns: C
  readonly schema: Schema

  constructor(options: BaseModelOptions<C>) {
    this.schema = buildSchema({
      name: options.name,
      tableName: options.tableName,
      columns: options.columns,
    })
    const columns = { ...options.columns }
    Object.freeze(columns)
    this.name = options.name
    this.columns = columns
  }

  /**
   * Build an instance. Columns left out get their default, with producer
   * defaults invoked once for this instance.
   *
   * @param extras - Non-schema fields carried alongside, never persisted
   */
  create(values?: ModelValues<C>, extras?: Readonly<Row>): ModelInstance<C> {
    return new ModelInstance(this, values ?? {}, extras)
  }

  /** Map a driver row back into an instance. */
  fromRecord(row: Row | unknown[]): ModelInstance<C> {
    const mapped = this.readRecord(row)
    return new ModelInstance(this, mapped.values, mapped.extras)
  }

  /**
   * Derive a model that declares additional columns after this model's.
   * A column declared under an attribute name this model already uses
   * replaces the inherited one in place.
   */
  extend<D extends ColumnMap>(options: BaseModelOptions<D>): BaseModel<C & D> {
    return new BaseModel({
      name: options.name,
      tableName: options.tableName,
      columns: { ...this.columns, ...options.columns },
    })
  }

  /**
   * Split a row into column values (by attribute name) and extras.
   * Object rows are read by column key, falling back to the attribute name;
   * positional rows are zipped against the schema's column order.
   *
   * @throws MappingError when the row lacks a declared column
   */
  protected readRecord(row: Row | unknown[]): { values: Row; extras: Row } {
    const columns = this.schema.columns()
    const values: Row = {}
    const extras: Row = {}

    if (isPositional(row)) {
      for (let index = 0; index < columns.length; index++) {
        const col = columns[index]
        if (index >= row.length) {
          throw new MappingError(this.name, col.key, `Row for "${this.name}" has no value for column "${col.key}"`)
        }
        values[col.attributeName] = row[index]
      }
      return { values, extras }
    }

    const consumed = new Set<string>()
    for (const col of columns) {
      if (Object.hasOwn(row, col.key)) {
        values[col.attributeName] = row[col.key]
        consumed.add(col.key)
      } else if (Object.hasOwn(row, col.attributeName)) {
        values[col.attributeName] = row[col.attributeName]
        consumed.add(col.attributeName)
      } else {
        throw new MappingError(this.name, col.key, `Row for "${this.name}" has no column "${col.key}"`)
      }
    }
    for (const [field, value] of Object.entries(row)) {
      if (!consumed.has(field)) extras[field] = value
    }
    return { values, extras }
  }
}

/**
 * An in-memory model instance. Column values are held by the columns
 * themselves, keyed by this instance; `extras` holds anything else.
 */
export class ModelInstance<C extends ColumnMap> {
  readonly model: BaseModel<C>
  readonly extras: Map<string, unknown>

  /**
   * @param values - Column values by attribute name or database key; when
   *   both name the same column, the attribute name wins
   */
  constructor(model: BaseModel<C>, values: Readonly<Row>, extras: Readonly<Row> = {}) {
    this.model = model
    this.extras = new Map(Object.entries(extras))

    const given = new Map<Column<unknown>, unknown>()
    for (const [name, value] of Object.entries(values)) {
      const col = model.schema.resolve(name)
      if (!col) {
        this.extras.set(name, value)
      } else if (name === col.attributeName || !given.has(col)) {
        given.set(col, value)
      }
    }
    for (const col of model.schema.columns()) {
      const value = given.get(col)
      col.set(this, value === undefined ? col.resolveDefault() : value)
    }
  }

  /** Value accessor by attribute name. */
  get<A extends keyof C & string>(attribute: A): ColumnValue<C[A]> {
    // The column map is typed per attribute; the lookup through it is not.
    return this.model.columns[attribute].get(this) as ColumnValue<C[A]>
  }

  set<A extends keyof C & string>(attribute: A, value: ColumnValue<C[A]>): void {
    this.model.columns[attribute].set(this, value)
  }

  /** Current values by attribute name, in schema order. */
  toValues(): Row {
    const out: Row = {}
    for (const col of this.model.schema.columns()) {
      out[col.attributeName] = col.get(this)
    }
    return out
  }

  /** Current values by database key, in schema order. */
  toRecord(): Row {
    const out: Row = {}
    for (const col of this.model.schema.columns()) {
      out[col.key] = col.get(this)
    }
    return out
  }

  toString(): string {
    const fields = this.model.schema
      .columns()
      .map((col) => `${col.attributeName}=${formatValue(col.get(this))}`)
    for (const [name, value] of this.extras) {
      fields.push(`${name}=${formatValue(value)}`)
    }
    return `${this.model.name}(${fields.join(', ')})`
  }
}

/**
 * Define a model without a connection: enough to build statements and
 * map rows, nothing that executes.
 *
 * @throws ConfigurationError when the columns do not form a valid schema
 */
export function defineBaseModel<C extends ColumnMap>(options: BaseModelOptions<C>): BaseModel<C> {
  return new BaseModel(options)
}
