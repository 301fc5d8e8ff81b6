export { Schema, buildSchema, type ColumnMap, type SchemaDefinition } from './schema.js'
