import type { Connection, ConnectionManager } from './interface.js'

/**
 * Shared scoped-acquisition logic for connection managers.
 * Subclasses decide where connections come from and where they go back to.
 */
export abstract class BaseConnectionManager implements ConnectionManager {
  abstract acquire(): Promise<Connection>
  abstract release(connection: Connection): Promise<void>
  abstract close(): Promise<void>

  /**
   * Acquire a connection, run `fn` with it and release it afterwards,
   * whether `fn` resolves or rejects.
   */
  async use<T>(fn: (connection: Connection) => Promise<T>): Promise<T> {
    const connection = await this.acquire()
    try {
      return await fn(connection)
    } finally {
      await this.release(connection)
    }
  }
}
