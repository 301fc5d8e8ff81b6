import { ConfigurationError } from '../errors.js'
import { BaseConnectionManager } from './base.js'
import type { Connection, Driver, DriverConnection } from './interface.js'

export interface SingleConnectionOptions {
  /**
   * Reuse one lazily opened connection across scopes instead of opening
   * and closing a connection per scope. Default false.
   */
  keepAlive?: boolean
}

/**
 * Connection manager backed by single physical connections.
 *
 * With `keepAlive`, every scope shares one connection. Scopes take turns
 * on it: an acquire waits until the previous holder releases, so the
 * transactions of overlapping operations never share a session. Without
 * `keepAlive`, each scope opens its own connection and closes it on
 * release.
 */
export class SingleConnectionManager extends BaseConnectionManager {
  readonly keepAlive: boolean

  private readonly driver: Driver
  private kept: Promise<DriverConnection> | null = null
  private holder: DriverConnection | null = null
  private held = false
  private readonly waiters: Array<() => void> = []
  private readonly opened = new Map<Connection, DriverConnection>()

  constructor(driver: Driver, options: SingleConnectionOptions = {}) {
    super()
    this.driver = driver
    this.keepAlive = options.keepAlive ?? false
  }

  /** Connections opened per scope and not yet released. */
  get openCount(): number {
    return this.opened.size
  }

  /** Scopes waiting for the kept-alive connection. */
  get waiting(): number {
    return this.waiters.length
  }

  async acquire(): Promise<Connection> {
    if (this.keepAlive) return this.acquireKept()
    const connection = await this.driver.connect()
    this.opened.set(connection, connection)
    return connection
  }

  async release(connection: Connection): Promise<void> {
    if (this.keepAlive) {
      if (!this.held || connection !== this.holder) {
        throw new ConfigurationError('FOREIGN_CONNECTION', 'Connection is not held by this manager')
      }
      this.holder = null
      this.handOff()
      return
    }
    const opened = this.opened.get(connection)
    if (!opened) {
      throw new ConfigurationError('FOREIGN_CONNECTION', 'Connection was not acquired from this manager')
    }
    this.opened.delete(connection)
    await opened.close()
  }

  async close(): Promise<void> {
    const kept = this.kept
    this.kept = null
    if (kept) {
      await (await kept).close()
    }
  }

  private async acquireKept(): Promise<DriverConnection> {
    if (this.held) {
      // Released holders pass the turn straight to the next waiter.
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }
    this.held = true
    try {
      const connection = await this.keptConnection()
      this.holder = connection
      return connection
    } catch (err) {
      this.handOff()
      throw err
    }
  }

  private handOff(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.held = false
    }
  }

  private keptConnection(): Promise<DriverConnection> {
    // A failed connect is retried by the next scope.
    if (!this.kept) {
      this.kept = this.driver.connect().catch((err: unknown) => {
        this.kept = null
        throw err
      })
    }
    return this.kept
  }
}
