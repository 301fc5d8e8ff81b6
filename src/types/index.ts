// Configuration
export { DatabaseConfigSchema, ManagerKind } from './config.js'
export type { DatabaseConfig } from './config.js'

// Query log
export { QueryLogEntrySchema, QueryKindSchema } from './query-log.js'
export type { QueryLogEntry, QueryKind } from './query-log.js'
