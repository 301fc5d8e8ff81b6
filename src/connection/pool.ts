import { ConfigurationError } from '../errors.js'
import { BaseConnectionManager } from './base.js'
import type { Connection, Driver, DriverConnection, DriverPool } from './interface.js'

interface CheckedOut {
  pool: DriverPool
  connection: DriverConnection
}

/**
 * Connection manager that checks connections out of a shared pool.
 *
 * The pool is created on first use. Share one manager between models to
 * share one pool.
 */
export class PoolManager extends BaseConnectionManager {
  private readonly driver: Driver
  private pool: Promise<DriverPool> | null = null
  private readonly checkedOut = new Map<Connection, CheckedOut>()

  constructor(driver: Driver) {
    super()
    this.driver = driver
  }

  /** Connections currently checked out through this manager. */
  get inUse(): number {
    return this.checkedOut.size
  }

  async acquire(): Promise<Connection> {
    const pool = await this.getPool()
    const connection = await pool.acquire()
    this.checkedOut.set(connection, { pool, connection })
    return connection
  }

  /** Return the connection to its pool, unconditionally. */
  async release(connection: Connection): Promise<void> {
    const entry = this.checkedOut.get(connection)
    if (!entry) {
      throw new ConfigurationError('FOREIGN_CONNECTION', 'Connection was not acquired from this manager')
    }
    this.checkedOut.delete(connection)
    await entry.pool.release(entry.connection)
  }

  async close(): Promise<void> {
    const pool = this.pool
    this.pool = null
    if (pool) {
      await (await pool).close()
    }
  }

  private getPool(): Promise<DriverPool> {
    if (!this.pool) {
      this.pool = this.driver.createPool().catch((err: unknown) => {
        this.pool = null
        throw err
      })
    }
    return this.pool
  }
}
