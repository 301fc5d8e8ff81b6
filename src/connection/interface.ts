/** A raw row as returned by the driver, addressed by column key. */
export type Row = { [key: string]: unknown }

/**
 * Thin database connection abstraction.
 *
 * The statement text uses `$1, $2, ...` placeholders; `args` follow in the
 * same order. Implementations propagate driver errors unchanged.
 */
export interface Connection {
  /** Run a statement and return the driver's command status, e.g. `UPDATE 1`. */
  execute(query: string, ...args: unknown[]): Promise<string>

  /** Run a query and return every row. */
  fetch(query: string, ...args: unknown[]): Promise<Row[]>

  /** Run a query and return its first row, or null when there is none. */
  fetchrow(query: string, ...args: unknown[]): Promise<Row | null>

  /** Run `fn` inside a transaction. Commits on success, rolls back on error. */
  transaction<T>(fn: () => Promise<T>): Promise<T>
}

/** A physical connection the driver opened and that can be closed. */
export interface DriverConnection extends Connection {
  close(): Promise<void>
}

/** A driver-side pool of connections. */
export interface DriverPool {
  /** Check a connection out, waiting per pool policy until one is free. */
  acquire(): Promise<DriverConnection>

  /** Return a checked-out connection to the pool. */
  release(connection: DriverConnection): Promise<void>

  close(): Promise<void>
}

/** Creates connections and pools for one database. */
export interface Driver {
  connect(): Promise<DriverConnection>
  createPool(): Promise<DriverPool>
}

/**
 * Source of a usable connection for model operations.
 *
 * `use` is the scoped form: the connection is released on every exit path,
 * including when `fn` rejects.
 */
export interface ConnectionManager {
  acquire(): Promise<Connection>
  release(connection: Connection): Promise<void>
  use<T>(fn: (connection: Connection) => Promise<T>): Promise<T>
  /** Close the kept-alive connection or the pool. The manager can be used again afterwards. */
  close(): Promise<void>
}
