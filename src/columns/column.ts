import { ConfigurationError } from '../errors.js'
import type { ColumnType } from './column-type.js'

/** A default value, or a zero-argument producer invoked once per instance. */
export type ColumnDefault<T> = T | (() => T)

export interface ColumnOptions<T> {
  /** Database column name. Defaults to the attribute name the column is declared under. */
  key?: string
  /** Storage type, used only when rendering DDL. */
  type?: ColumnType
  default?: ColumnDefault<T>
  primaryKey?: boolean
}

function isProducer<T>(value: ColumnDefault<T> | undefined): value is () => T {
  return typeof value === 'function'
}

function quote(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (typeof value === 'function') return value.name ? `[Function ${value.name}]` : '[Function]'
  return String(value)
}

/**
 * One table column bound to one model attribute.
 *
 * The column itself is the metadata object (`key`, `type`, `primaryKey`,
 * `default`). Instance values live in a per-column WeakMap keyed by the
 * model instance, reached only through `get` and `set`.
 */
export class Column<T = unknown> {
  readonly type: ColumnType | undefined
  readonly default: ColumnDefault<T> | undefined
  readonly primaryKey: boolean

  private readonly explicitKey: string | undefined
  private boundName: string | undefined
  private readonly values = new WeakMap<object, T | null>()

  constructor(options: ColumnOptions<T> = {}) {
    this.explicitKey = options.key
    this.type = options.type
    this.default = options.default
    this.primaryKey = options.primaryKey ?? false
  }

  get isBound(): boolean {
    return this.boundName !== undefined
  }

  /** Attribute name the column was declared under on its model. */
  get attributeName(): string {
    if (this.boundName === undefined) {
      throw new ConfigurationError('UNBOUND_COLUMN', 'Column has not been bound to a model attribute')
    }
    return this.boundName
  }

  /** Database column name. */
  get key(): string {
    return this.explicitKey ?? this.attributeName
  }

  /**
   * Record the attribute name this column is declared under.
   * Rebinding under the same name is a no-op.
   *
   * @throws ConfigurationError when already bound under a different name
   */
  bind(attributeName: string): this {
    if (this.boundName === undefined) {
      this.boundName = attributeName
    } else if (this.boundName !== attributeName) {
      throw new ConfigurationError(
        'CONFLICTING_BINDING',
        `Column "${this.key}" is bound to "${this.boundName}", cannot rebind to "${attributeName}"`,
      )
    }
    return this
  }

  /** Evaluate the default, calling a producer default once. */
  resolveDefault(): T | null {
    if (isProducer(this.default)) return this.default()
    return this.default ?? null
  }

  /** Whether a value has been stored for this column on the instance. */
  has(instance: object): boolean {
    return this.values.has(instance)
  }

  /**
   * Read the instance's value. An instance that never had this column
   * written gets the default materialized and stored once.
   */
  get(instance: object): T | null {
    if (!this.values.has(instance)) {
      const value = this.resolveDefault()
      this.values.set(instance, value)
      return value
    }
    return this.values.get(instance) ?? null
  }

  /** Store a value on the instance. No coercion; the driver judges the type. */
  set(instance: object, value: T | null): void {
    this.values.set(instance, value)
  }

  /**
   * Column definition for CREATE TABLE.
   *
   * @throws ConfigurationError when no type was declared
   */
  toDDL(): string {
    if (this.type === undefined) {
      throw new ConfigurationError('MISSING_COLUMN_TYPE', `Column "${this.key}" has no type`)
    }
    const definition = `${this.key} ${this.type.render()}`
    return this.primaryKey ? `${definition} PRIMARY KEY` : definition
  }

  toString(): string {
    const key = this.explicitKey ?? this.boundName
    const parts = [
      `key=${key === undefined ? 'unbound' : quote(key)}`,
      `default=${quote(this.default ?? null)}`,
      `primaryKey=${this.primaryKey}`,
    ]
    if (this.type !== undefined) parts.push(`type=${this.type.render()}`)
    return `Column(${parts.join(', ')})`
  }
}

/**
 * Declare a column.
 *
 * @example
 * ```typescript
 * const id = column({ key: '_id', type: Types.UUID, primaryKey: true, default: randomUUID })
 * const name = column<string>({ type: Types.String(40) })
 * ```
 */
export function column<T = unknown>(options: ColumnOptions<T> = {}): Column<T> {
  return new Column<T>(options)
}
