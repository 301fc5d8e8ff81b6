/** Typed configuration error codes for downstream error handling */
export type ConfigurationErrorCode =
  | 'CONFLICTING_BINDING'
  | 'UNBOUND_COLUMN'
  | 'DUPLICATE_COLUMN_KEY'
  | 'MULTIPLE_PRIMARY_KEYS'
  | 'MISSING_PRIMARY_KEY'
  | 'UNKNOWN_COLUMN'
  | 'INVALID_TABLE_NAME'
  | 'INVALID_COLUMN_TYPE'
  | 'MISSING_COLUMN_TYPE'
  | 'MISSING_CONNECTION_MANAGER'
  | 'FOREIGN_CONNECTION'

/**
 * Raised at model-definition or statement-build time when the declared
 * metadata cannot produce a valid statement. Never retried.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.code = code
  }
}

/**
 * Raised when a row returned by the driver lacks a column the model
 * declares, i.e. the table and the model schema have drifted apart.
 */
export class MappingError extends Error {
  constructor(
    public readonly model: string,
    public readonly column: string,
    message: string,
  ) {
    super(message)
    this.name = 'MappingError'
  }
}
