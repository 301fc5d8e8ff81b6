export { Statement, PlaceholderCounter, type StatementKind } from './statement.js'
export {
  selectStatement,
  insertStatement,
  updateStatement,
  deleteStatement,
  type SchemaSource,
  type InstanceSource,
  type Filters,
} from './builders.js'
