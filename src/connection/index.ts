export type { Row, Connection, DriverConnection, DriverPool, Driver, ConnectionManager } from './interface.js'
export { BaseConnectionManager } from './base.js'
export { SingleConnectionManager, type SingleConnectionOptions } from './single.js'
export { PoolManager } from './pool.js'
export {
  PgConnection,
  PgPool,
  createPgDriver,
  commandTag,
  type PgQueryable,
  type PgPoolClient,
  type PgPoolLike,
} from './pg.js'
export { createConnectionManager, toPgConfig } from './factory.js'
