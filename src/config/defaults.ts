import type { DatabaseConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: DatabaseConfig = {
  connection: {
    host: 'localhost',
    port: 5432,
    user: 'postgres',
    database: 'postgres',
  },
  manager: {
    kind: 'pool',
    keepAlive: false,
  },
  pool: {
    max: 10,
    idleTimeoutMillis: 10000,
    connectionTimeoutMillis: 0,
  },
  queryLog: {
    enabled: false,
    path: './data/queries.jsonl',
  },
}
