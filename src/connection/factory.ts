import type { PoolConfig } from 'pg'
import type { DatabaseConfig } from '../types/config.js'
import type { ConnectionManager, Driver } from './interface.js'
import { createPgDriver } from './pg.js'
import { PoolManager } from './pool.js'
import { SingleConnectionManager } from './single.js'

/** node-postgres options for a loaded configuration. */
export function toPgConfig(config: DatabaseConfig): PoolConfig {
  const { connection, pool } = config
  const pgConfig: PoolConfig = {
    max: pool.max,
    idleTimeoutMillis: pool.idleTimeoutMillis,
    connectionTimeoutMillis: pool.connectionTimeoutMillis,
  }
  if (connection.statementTimeoutMs !== undefined) {
    pgConfig.statement_timeout = connection.statementTimeoutMs
  }
  if (connection.connectionString !== undefined) {
    pgConfig.connectionString = connection.connectionString
    return pgConfig
  }
  pgConfig.host = connection.host
  pgConfig.port = connection.port
  pgConfig.user = connection.user
  pgConfig.database = connection.database
  if (connection.password !== undefined) {
    pgConfig.password = connection.password
  }
  return pgConfig
}

/**
 * Build the connection manager a configuration asks for.
 *
 * @param driver - Defaults to a node-postgres driver for the configured database
 */
export function createConnectionManager(
  config: DatabaseConfig,
  driver: Driver = createPgDriver(toPgConfig(config)),
): ConnectionManager {
  if (config.manager.kind === 'pool') {
    return new PoolManager(driver)
  }
  return new SingleConnectionManager(driver, { keepAlive: config.manager.keepAlive })
}
