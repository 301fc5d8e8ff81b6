import pg from 'pg'
import type { Client, PoolConfig, QueryResult, QueryResultRow } from 'pg'
import { ConfigurationError } from '../errors.js'
import type { Connection, Driver, DriverConnection, DriverPool, Row } from './interface.js'

/** The part of a node-postgres client this adapter talks to. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>
}

/** A client checked out of a node-postgres pool. */
export interface PgPoolClient extends PgQueryable {
  release(err?: Error | boolean): void
}

/** The part of a node-postgres pool this adapter talks to. */
export interface PgPoolLike {
  connect(): Promise<PgPoolClient>
  end(): Promise<void>
}

/**
 * PostgreSQL command tag for a completed query, e.g. `INSERT 0 1` or
 * `DELETE 3`. Commands that report no row count (`CREATE`, `BEGIN`, ...)
 * render as the bare command.
 */
export function commandTag(result: QueryResult<QueryResultRow>): string {
  if (result.rowCount === null) return result.command
  if (result.command === 'INSERT') {
    return `INSERT ${result.oid ?? 0} ${result.rowCount}`
  }
  return `${result.command} ${result.rowCount}`
}

/**
 * Connection over a node-postgres client.
 *
 * Nested `transaction` calls become savepoints inside the outer
 * transaction. A session holds one transaction, so two scopes must not
 * run transactions on the same connection at once; the connection
 * managers hand a connection to one scope at a time. Driver errors pass
 * through untouched.
 */
export class PgConnection implements Connection {
  protected readonly client: PgQueryable
  private depth = 0

  constructor(client: PgQueryable) {
    this.client = client
  }

  async execute(query: string, ...args: unknown[]): Promise<string> {
    const result = await this.client.query(query, args)
    return commandTag(result)
  }

  async fetch(query: string, ...args: unknown[]): Promise<Row[]> {
    const result = await this.client.query(query, args)
    return result.rows
  }

  async fetchrow(query: string, ...args: unknown[]): Promise<Row | null> {
    const rows = await this.fetch(query, ...args)
    return rows[0] ?? null
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const savepoint = this.depth > 0 ? `pgmodel_sp_${this.depth}` : null
    await this.client.query(savepoint ? `SAVEPOINT ${savepoint}` : 'BEGIN')
    this.depth++
    try {
      const result = await fn()
      await this.client.query(savepoint ? `RELEASE SAVEPOINT ${savepoint}` : 'COMMIT')
      return result
    } catch (err) {
      try {
        await this.client.query(savepoint ? `ROLLBACK TO SAVEPOINT ${savepoint}` : 'ROLLBACK')
      } catch {
        // The error from `fn` is the one reported, even when the rollback fails too
        throw err
      }
      throw err
    } finally {
      this.depth--
    }
  }
}

/** A standalone client connection, closed with `end()`. */
class PgClientConnection extends PgConnection implements DriverConnection {
  private readonly pgClient: Client

  constructor(client: Client) {
    super(client)
    this.pgClient = client
  }

  async close(): Promise<void> {
    await this.pgClient.end()
  }
}

/** A connection checked out of a pool; `close` hands the client back to it. */
class PgPooledConnection extends PgConnection implements DriverConnection {
  readonly poolClient: PgPoolClient

  constructor(client: PgPoolClient) {
    super(client)
    this.poolClient = client
  }

  async close(): Promise<void> {
    this.poolClient.release()
  }
}

/**
 * DriverPool over a node-postgres pool. Waiting for a free client, pool
 * size and idle eviction follow the pool's own configuration.
 */
export class PgPool implements DriverPool {
  private readonly pool: PgPoolLike
  private readonly checkedOut = new Set<PgPooledConnection>()

  constructor(pool: PgPoolLike) {
    this.pool = pool
  }

  async acquire(): Promise<DriverConnection> {
    const client = await this.pool.connect()
    const connection = new PgPooledConnection(client)
    this.checkedOut.add(connection)
    return connection
  }

  async release(connection: DriverConnection): Promise<void> {
    const pooled = [...this.checkedOut].find((c) => c === connection)
    if (!pooled) {
      throw new ConfigurationError('FOREIGN_CONNECTION', 'Connection was not acquired from this pool')
    }
    this.checkedOut.delete(pooled)
    await pooled.close()
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

/**
 * Driver backed by node-postgres. `config` is passed to `pg.Client` for
 * single connections and to `pg.Pool` for pools.
 */
export function createPgDriver(config: PoolConfig = {}): Driver {
  return {
    async connect(): Promise<DriverConnection> {
      const client = new pg.Client(config)
      await client.connect()
      return new PgClientConnection(client)
    },
    async createPool(): Promise<DriverPool> {
      return new PgPool(new pg.Pool(config))
    },
  }
}
