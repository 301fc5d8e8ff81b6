import type { SchemaSource } from '../statements/builders.js'

export interface DropOptions {
  /** Also drop or truncate objects that depend on the table. */
  cascade?: boolean
}

/** A model able to run raw SQL, such as an AsyncModel. */
export interface ExecutingModel extends SchemaSource {
  execute(query: string, ...args: unknown[]): Promise<string>
}

/**
 * `CREATE TABLE IF NOT EXISTS <table> (<column definitions>)`
 *
 * @throws ConfigurationError when a column declares no type
 */
export function createTableStatement(model: SchemaSource): string {
  const { schema } = model
  const definitions = schema.columns().map((col) => col.toDDL())
  return `CREATE TABLE IF NOT EXISTS ${schema.tableName} (${definitions.join(', ')})`
}

export function dropTableStatement(model: SchemaSource, options: DropOptions = {}): string {
  const text = `DROP TABLE IF EXISTS ${model.schema.tableName}`
  return options.cascade ? `${text} CASCADE` : text
}

export function truncateTableStatement(model: SchemaSource, options: DropOptions = {}): string {
  const text = `TRUNCATE TABLE ${model.schema.tableName}`
  return options.cascade ? `${text} CASCADE` : text
}

export function createTable(model: ExecutingModel): Promise<string> {
  return model.execute(createTableStatement(model))
}

export function dropTable(model: ExecutingModel, options: DropOptions = {}): Promise<string> {
  return model.execute(dropTableStatement(model, options))
}

export function truncateTable(model: ExecutingModel, options: DropOptions = {}): Promise<string> {
  return model.execute(truncateTableStatement(model, options))
}
