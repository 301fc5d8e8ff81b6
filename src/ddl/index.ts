export {
  createTable,
  createTableStatement,
  dropTable,
  dropTableStatement,
  truncateTable,
  truncateTableStatement,
  type DropOptions,
  type ExecutingModel,
} from './table.js'
