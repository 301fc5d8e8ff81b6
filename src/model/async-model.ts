import { ConfigurationError } from '../errors.js'
import type { ColumnMap } from '../schema/schema.js'
import type { Connection, ConnectionManager, Row } from '../connection/interface.js'
import type { QueryLogger } from '../logging/query-log.js'
import type { QueryKind } from '../types/query-log.js'
import {
  deleteStatement,
  insertStatement,
  selectStatement,
  updateStatement,
} from '../statements/builders.js'
import type { Statement } from '../statements/statement.js'
import { BaseModel, ModelInstance, type BaseModelOptions, type ModelInit, type ModelValues } from './base-model.js'

/**
 * Where an instance stands relative to the database:
 * never saved, backed by a row, or deleted but still usable in memory.
 */
export type InstanceState = 'transient' | 'persisted' | 'detached'

/** Equality filters by attribute name, or by database key. */
export type ModelFilters<C extends ColumnMap> = ModelInit<C> & Readonly<Record<string, unknown>>

export interface AsyncModelOptions<C extends ColumnMap> extends BaseModelOptions<C> {
  connectionManager: ConnectionManager
  /** Default for `get`/`getOne`: raw rows (true, the default) or model instances. */
  returnRecords?: boolean
  queryLog?: QueryLogger
}

/** Options for a derived model; anything left out is taken from the parent. */
export interface AsyncModelExtendOptions<D extends ColumnMap> extends BaseModelOptions<D> {
  connectionManager?: ConnectionManager
  returnRecords?: boolean
  queryLog?: QueryLogger
}

export interface GetOptions {
  /** Raw rows when true, model instances when false. */
  records?: boolean
}

export interface GetOneOptions {
  record?: boolean
}

const lifecycle = new WeakMap<object, InstanceState>()

/**
 * A model bound to a connection manager.
 *
 * Every operation builds its statement first, then runs it inside a
 * transaction on a connection acquired for that call alone. Driver errors
 * reach the caller unchanged.
 *
 * @example
 * ```typescript
 * const User = defineModel({
 *   name: 'User',
 *   tableName: 'users',
 *   connectionManager: new PoolManager(createPgDriver({ connectionString })),
 *   columns: {
 *     id: column<string>({ key: '_id', type: Types.UUID, primaryKey: true, default: () => randomUUID() }),
 *     name: column<string>({ type: Types.String(40) }),
 *   },
 * })
 *
 * const user = User.create({ name: 'foo' })
 * await user.save()
 * const rows = await User.get({ name: 'foo' })
 * ```
 */
export class AsyncModel<C extends ColumnMap> extends BaseModel<C> {
  readonly returnRecords: boolean

  private readonly manager: ConnectionManager
  private readonly queryLog: QueryLogger | undefined

  constructor(options: AsyncModelOptions<C>) {
    super(options)
    if (!options.connectionManager) {
      throw new ConfigurationError(
        'MISSING_CONNECTION_MANAGER',
        `Model "${options.name}" needs a connection manager`,
      )
    }
    this.manager = options.connectionManager
    this.returnRecords = options.returnRecords ?? true
    this.queryLog = options.queryLog
  }

  /** The connection manager shared by this model's operations. */
  connection(): ConnectionManager {
    return this.manager
  }

  override create(values?: ModelValues<C>, extras?: Readonly<Row>): AsyncModelInstance<C> {
    return new AsyncModelInstance(this, values ?? {}, extras)
  }

  /** Map a row into an instance, which counts as persisted. */
  override fromRecord(row: Row | unknown[]): AsyncModelInstance<C> {
    const mapped = this.readRecord(row)
    const instance = new AsyncModelInstance(this, mapped.values, mapped.extras)
    lifecycle.set(instance, 'persisted')
    return instance
  }

  override extend<D extends ColumnMap>(options: AsyncModelExtendOptions<D>): AsyncModel<C & D> {
    return new AsyncModel({
      name: options.name,
      tableName: options.tableName,
      columns: { ...this.columns, ...options.columns },
      connectionManager: options.connectionManager ?? this.manager,
      returnRecords: options.returnRecords ?? this.returnRecords,
      queryLog: options.queryLog ?? this.queryLog,
    })
  }

  stateOf(instance: ModelInstance<C>): InstanceState {
    return lifecycle.get(instance) ?? 'transient'
  }

  /**
   * Insert the instance, or update its row when it is already persisted.
   * No concurrency check: updating a row that no longer exists changes
   * nothing and does not fail.
   */
  async save(instance: ModelInstance<C>): Promise<void> {
    const statement = this.stateOf(instance) === 'persisted' ? updateStatement(instance) : insertStatement(instance)
    await this.runStatement(statement, (conn) => conn.execute(...statement.query()))
    lifecycle.set(instance, 'persisted')
  }

  /** Delete the row matching the instance's current primary key value. */
  async delete(instance: ModelInstance<C>): Promise<void> {
    const statement = deleteStatement(instance)
    await this.runStatement(statement, (conn) => conn.execute(...statement.query()))
    lifecycle.set(instance, 'detached')
  }

  /**
   * Fetch every row matching the filters, as raw rows or as instances.
   * `options.records` falls back to the model's `returnRecords`.
   */
  get(filters: ModelFilters<C> | undefined, options: { records: true }): Promise<Row[]>
  get(filters: ModelFilters<C> | undefined, options: { records: false }): Promise<AsyncModelInstance<C>[]>
  get(filters?: ModelFilters<C>, options?: GetOptions): Promise<Row[] | AsyncModelInstance<C>[]>
  async get(filters?: ModelFilters<C>, options: GetOptions = {}): Promise<Row[] | AsyncModelInstance<C>[]> {
    const statement = selectStatement(this, filters ?? {})
    const rows = await this.runStatement(statement, (conn) => conn.fetch(...statement.query()))
    if (options.records ?? this.returnRecords) return rows
    return rows.map((row) => this.fromRecord(row))
  }

  /** Fetch the first matching row, or null when nothing matches. */
  getOne(filters: ModelFilters<C> | undefined, options: { record: true }): Promise<Row | null>
  getOne(filters: ModelFilters<C> | undefined, options: { record: false }): Promise<AsyncModelInstance<C> | null>
  getOne(filters?: ModelFilters<C>, options?: GetOneOptions): Promise<Row | AsyncModelInstance<C> | null>
  async getOne(filters?: ModelFilters<C>, options: GetOneOptions = {}): Promise<Row | AsyncModelInstance<C> | null> {
    const statement = selectStatement(this, filters ?? {})
    const row = await this.runStatement(statement, (conn) => conn.fetchrow(...statement.query()))
    if (row === null) return null
    if (options.record ?? this.returnRecords) return row
    return this.fromRecord(row)
  }

  /** Run an arbitrary statement in a transaction on this model's manager. */
  async execute(query: string, ...args: unknown[]): Promise<string> {
    return this.run('raw', query, args, (conn) => conn.execute(query, ...args))
  }

  private runStatement<T>(statement: Statement, op: (conn: Connection) => Promise<T>): Promise<T> {
    return this.run(statement.kind, statement.text, statement.args, op)
  }

  private run<T>(
    kind: QueryKind,
    sql: string,
    args: readonly unknown[],
    op: (conn: Connection) => Promise<T>,
  ): Promise<T> {
    this.queryLog?.append({ model: this.name, kind, sql, args })
    return this.manager.use((conn) => conn.transaction(() => op(conn)))
  }
}

/**
 * An instance of an AsyncModel, able to save and delete itself.
 */
export class AsyncModelInstance<C extends ColumnMap> extends ModelInstance<C> {
  declare readonly model: AsyncModel<C>

  constructor(model: AsyncModel<C>, values: Readonly<Row>, extras?: Readonly<Row>) {
    super(model, values, extras)
  }

  get state(): InstanceState {
    return this.model.stateOf(this)
  }

  save(): Promise<void> {
    return this.model.save(this)
  }

  delete(): Promise<void> {
    return this.model.delete(this)
  }
}

/**
 * Define a model and bind it to the connection manager its operations use.
 *
 * @throws ConfigurationError when the columns do not form a valid schema
 *   or no connection manager is given
 */
export function defineModel<C extends ColumnMap>(options: AsyncModelOptions<C>): AsyncModel<C> {
  return new AsyncModel(options)
}
