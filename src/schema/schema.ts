import { ConfigurationError } from '../errors.js'
import type { Column } from '../columns/column.js'

/** Declared columns of a model, keyed by attribute name. */
export type ColumnMap = Record<string, Column<unknown>>

export interface SchemaDefinition {
  /** Model name; the lowercased name is the default table name. */
  name: string
  tableName?: string
  /** Columns in declaration order, inherited ones already placed first. */
  columns: ColumnMap
}

/**
 * Ordered, immutable table metadata for one model.
 *
 * Built once when the model is defined; columns added to the declaration
 * afterwards are not picked up.
 */
export class Schema {
  readonly name: string
  readonly tableName: string

  private readonly ordered: readonly Column<unknown>[]
  private readonly byAttribute: ReadonlyMap<string, Column<unknown>>
  private readonly byKey: ReadonlyMap<string, Column<unknown>>
  private readonly pk: Column<unknown> | null

  constructor(definition: SchemaDefinition) {
    const tableName = definition.tableName ?? definition.name.toLowerCase()
    if (tableName.trim().length === 0) {
      throw new ConfigurationError('INVALID_TABLE_NAME', `Model "${definition.name}" has an empty table name`)
    }

    const byAttribute = new Map<string, Column<unknown>>()
    const byKey = new Map<string, Column<unknown>>()
    let pk: Column<unknown> | null = null

    for (const [attributeName, col] of Object.entries(definition.columns)) {
      col.bind(attributeName)

      const existing = byKey.get(col.key)
      if (existing) {
        throw new ConfigurationError(
          'DUPLICATE_COLUMN_KEY',
          `Model "${definition.name}": attributes "${existing.attributeName}" and "${attributeName}" both map to column "${col.key}"`,
        )
      }
      if (col.primaryKey) {
        if (pk) {
          throw new ConfigurationError(
            'MULTIPLE_PRIMARY_KEYS',
            `Model "${definition.name}" declares more than one primary key ("${pk.key}", "${col.key}")`,
          )
        }
        pk = col
      }

      byAttribute.set(attributeName, col)
      byKey.set(col.key, col)
    }

    this.name = definition.name
    this.tableName = tableName
    this.ordered = Object.freeze([...byAttribute.values()])
    this.byAttribute = byAttribute
    this.byKey = byKey
    this.pk = pk
    Object.freeze(this)
  }

  /** Columns in declaration order, inherited columns first. */
  columns(): readonly Column<unknown>[] {
    return this.ordered
  }

  primaryKey(): Column<unknown> | null {
    return this.pk
  }

  /** Database column names in declaration order. */
  keys(): string[] {
    return this.ordered.map((c) => c.key)
  }

  attributeNames(): string[] {
    return this.ordered.map((c) => c.attributeName)
  }

  /** Metadata accessor by declared attribute name. */
  column(attributeName: string): Column<unknown> | undefined {
    return this.byAttribute.get(attributeName)
  }

  columnForKey(key: string): Column<unknown> | undefined {
    return this.byKey.get(key)
  }

  /**
   * Find a column by attribute name or database key, attribute names first.
   * Returns undefined when neither matches.
   */
  resolve(nameOrKey: string): Column<unknown> | undefined {
    return this.byAttribute.get(nameOrKey) ?? this.byKey.get(nameOrKey)
  }
}

/**
 * Collect, bind and validate a model's columns.
 *
 * @throws ConfigurationError on duplicate keys, several primary keys,
 *   an empty table name, or a column already bound under another name
 */
export function buildSchema(definition: SchemaDefinition): Schema {
  return new Schema(definition)
}
