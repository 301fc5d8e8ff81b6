export { ConfigurationError, MappingError, type ConfigurationErrorCode } from './errors.js'
export * from './columns/index.js'
export * from './schema/index.js'
export * from './statements/index.js'
export * from './model/index.js'
export * from './connection/index.js'
export * from './ddl/index.js'
export * from './logging/index.js'
export * from './config/index.js'
export * from './types/index.js'
